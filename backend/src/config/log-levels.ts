import type { LogLevel } from '@nestjs/common';

// production: warnings and errors only; test: errors only
export function resolveLogLevels(nodeEnv: string): LogLevel[] {
  if (nodeEnv === 'production') {
    return ['error', 'warn'];
  }
  if (nodeEnv === 'test') {
    return ['error'];
  }
  return ['log', 'error', 'warn', 'debug'];
}
