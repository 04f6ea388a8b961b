import { Logger } from '@nestjs/common';
import { createOpenAI } from '@ai-sdk/openai';
import {
  embedMany,
  generateText as aiGenerateText,
  tool,
  type ModelMessage,
  type ToolSet,
} from 'ai';
import { ConfigurationError } from '../../config/config.errors.js';
import type { AiConfig } from '../../config/configuration.js';
import { ProviderError } from '../ai.errors.js';
import type {
  AiMessage,
  AiToolDefinition,
  EmbedTextOptions,
  EmbedTextResult,
  GenerateTextOptions,
  GenerateTextResult,
} from '../ai.types.js';
import type { AiProvider } from './ai-provider.js';

type GenerateTextParams = Parameters<typeof aiGenerateText>[0];
type EmbedManyParams = Parameters<typeof embedMany>[0];

export class OpenAiProvider implements AiProvider {
  public readonly name = 'openai';

  private readonly logger = new Logger(OpenAiProvider.name);
  private readonly client: ReturnType<typeof createOpenAI>;

  constructor(private readonly config: AiConfig) {
    this.client = this.createClient();
    this.logger.log(
      `OpenAI provider initialized with chat model: ${this.resolveChatModel()}, embedding model: ${this.resolveEmbeddingModel()}`,
    );
  }

  async generateText(
    options: GenerateTextOptions,
  ): Promise<GenerateTextResult> {
    try {
      // One attempt per call; the SDK would otherwise retry twice
      const generateOptions: GenerateTextParams = {
        model: this.getChatModel(options.model),
        messages: toModelMessages(options.messages),
        temperature: options.temperature ?? this.config.temperature,
        maxOutputTokens: options.maxTokens ?? this.config.maxOutputTokens,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(this.config.requestTimeoutMs),
      };

      if (options.tools && options.tools.length > 0) {
        generateOptions.tools = toToolSet(options.tools);
        generateOptions.toolChoice = 'auto';
      }

      const result = await aiGenerateText(generateOptions);

      return {
        content: result.text,
        toolCalls: result.toolCalls.map((call) => ({
          id: call.toolCallId,
          name: call.toolName,
          input: call.input,
        })),
      };
    } catch (error) {
      this.logger.error(
        'OpenAI text generation failed',
        error instanceof Error ? error.stack : error,
      );
      throw this.toProviderError('text generation', error);
    }
  }

  async embedText(options: EmbedTextOptions): Promise<EmbedTextResult> {
    if (options.inputs.length === 0) {
      return { embeddings: [] };
    }

    try {
      const embeddingOptions: EmbedManyParams = {
        model: this.getEmbeddingModel(options.model),
        values: options.inputs,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(this.config.requestTimeoutMs),
      };
      const result = await embedMany(embeddingOptions);

      return {
        embeddings: result.embeddings.map((embedding) => Array.from(embedding)),
      };
    } catch (error) {
      this.logger.error(
        'OpenAI embedding failed',
        error instanceof Error ? error.stack : error,
      );
      throw this.toProviderError('embedding', error);
    }
  }

  private toProviderError(operation: string, error: unknown): ProviderError {
    const cause = error instanceof Error ? error : new Error(String(error));
    if (cause.name === 'TimeoutError' || cause.name === 'AbortError') {
      return new ProviderError(
        'PROVIDER_TIMEOUT',
        this.name,
        `OpenAI ${operation} timed out after ${this.config.requestTimeoutMs}ms`,
        { cause },
      );
    }
    return new ProviderError(
      'PROVIDER_REQUEST_FAILED',
      this.name,
      `OpenAI ${operation} failed: ${cause.message}`,
      { cause },
    );
  }

  private resolveChatModel(model?: string) {
    return model ?? this.config.openai.chatModel ?? 'gpt-4o-mini';
  }

  private resolveEmbeddingModel(model?: string) {
    return (
      model ?? this.config.openai.embeddingModel ?? 'text-embedding-3-small'
    );
  }

  private getChatModel(model?: string): GenerateTextParams['model'] {
    const modelName = this.resolveChatModel(model);
    return this.client(modelName);
  }

  private getEmbeddingModel(model?: string): EmbedManyParams['model'] {
    const modelName = this.resolveEmbeddingModel(model);
    return this.client.embedding(modelName);
  }

  private createClient() {
    if (!this.config.openai.apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY is not configured');
    }

    return createOpenAI({
      apiKey: this.config.openai.apiKey,
    });
  }
}

// Tools are declared without `execute` so the SDK hands tool calls back
// instead of running them.
function toToolSet(definitions: AiToolDefinition[]): ToolSet {
  const tools: ToolSet = {};
  for (const definition of definitions) {
    tools[definition.name] = tool({
      description: definition.description,
      inputSchema: definition.parameters,
    });
  }
  return tools;
}

function toModelMessages(messages: AiMessage[]): ModelMessage[] {
  return messages.map((message): ModelMessage => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
      case 'assistant': {
        if (!message.toolCalls || message.toolCalls.length === 0) {
          return { role: 'assistant', content: message.content };
        }
        return {
          role: 'assistant',
          content: [
            ...(message.content
              ? [{ type: 'text' as const, text: message.content }]
              : []),
            ...message.toolCalls.map((call) => ({
              type: 'tool-call' as const,
              toolCallId: call.id,
              toolName: call.name,
              input: call.input,
            })),
          ],
        };
      }
      case 'tool':
        return {
          role: 'tool',
          content: message.results.map((result) => ({
            type: 'tool-result' as const,
            toolCallId: result.toolCallId,
            toolName: result.toolName,
            output: result.isError
              ? { type: 'error-text' as const, value: result.output }
              : { type: 'text' as const, value: result.output },
          })),
        };
    }
  });
}
