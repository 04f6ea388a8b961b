import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  requireConfig,
  type AiConfig,
  type AppConfig,
} from '../config/index.js';
import { AI_PROVIDER_TOKEN } from './ai.constants.js';
import { AIService } from './ai.service.js';
import type { AiProvider } from './providers/ai-provider.js';
import { OpenAiProvider } from './providers/openai.provider.js';

export function createAiProvider(config: AiConfig): AiProvider {
  switch (config.provider) {
    case 'openai':
      return new OpenAiProvider(config);
    default: {
      const provider: string = config.provider;
      throw new Error(`Unsupported AI provider: ${provider}`);
    }
  }
}

@Module({
  providers: [
    {
      provide: AI_PROVIDER_TOKEN,
      useFactory: (configService: ConfigService<AppConfig>): AiProvider => {
        const provider = createAiProvider(requireConfig(configService, 'ai'));
        Logger.log(`Using AI provider "${provider.name}"`, 'AiModule');
        return provider;
      },
      inject: [ConfigService],
    },
    AIService,
  ],
  exports: [AIService],
})
export class AiModule {}
