import type {
  EmbedTextOptions,
  EmbedTextResult,
  GenerateTextOptions,
  GenerateTextResult,
} from '../ai.types.js';

/**
 * Chat + embedding backend. Implementations make exactly one request per
 * call and reject with a `ProviderError`.
 */
export interface AiProvider {
  readonly name: string;
  /**
   * Tool calls requested by the model are returned in `toolCalls`; the
   * provider never runs them.
   */
  generateText(options: GenerateTextOptions): Promise<GenerateTextResult>;
  /** One vector per input, in input order. */
  embedText(options: EmbedTextOptions): Promise<EmbedTextResult>;
}
