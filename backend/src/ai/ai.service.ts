import { Inject, Injectable } from '@nestjs/common';
import { AI_PROVIDER_TOKEN } from './ai.constants.js';
import { ProviderError } from './ai.errors.js';
import type { AiProvider } from './providers/ai-provider.js';
import type {
  EmbedTextOptions,
  EmbedTextResult,
  GenerateTextOptions,
  GenerateTextResult,
} from './ai.types.js';

@Injectable()
export class AIService {
  constructor(
    @Inject(AI_PROVIDER_TOKEN) private readonly provider: AiProvider,
  ) {}

  generateText(options: GenerateTextOptions): Promise<GenerateTextResult> {
    return this.provider.generateText(options);
  }

  embedText(options: EmbedTextOptions): Promise<EmbedTextResult> {
    return this.provider.embedText(options);
  }

  async embedOne(input: string): Promise<number[]> {
    const { embeddings } = await this.provider.embedText({ inputs: [input] });
    const [embedding] = embeddings;
    if (!embedding) {
      throw new ProviderError(
        'PROVIDER_REQUEST_FAILED',
        this.provider.name,
        'Embedding response contained no vectors',
      );
    }
    return embedding;
  }
}
