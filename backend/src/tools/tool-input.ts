import type { ZodError } from 'zod';

export function describeInvalidInput(
  toolName: string,
  error: ZodError,
): string {
  const issues = error.issues
    .map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`)
    .join('; ');
  return `Invalid arguments for ${toolName}: ${issues}`;
}
