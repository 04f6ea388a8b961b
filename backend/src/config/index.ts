export { AppConfigModule } from './config.module.js';
export * from './configuration.js';
export { ConfigurationError } from './config.errors.js';
export { validateEnv, type EnvSchema } from './env.validation.js';
export { resolveLogLevels } from './log-levels.js';
