export { AiModule } from './ai.module.js';
export { AIService } from './ai.service.js';
export { AI_PROVIDER_TOKEN } from './ai.constants.js';
export { ProviderError, type ProviderErrorCode } from './ai.errors.js';
export type { AiProvider } from './providers/ai-provider.js';
export * from './ai.types.js';
