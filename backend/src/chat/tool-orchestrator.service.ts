import { Inject, Injectable, Logger } from '@nestjs/common';
import { ProviderError } from '../ai/ai.errors.js';
import { AIService } from '../ai/ai.service.js';
import type {
  AiMessage,
  AiToolCall,
  AiToolDefinition,
  AiToolResult,
  GenerateTextResult,
} from '../ai/ai.types.js';
import { ConfigurationError } from '../config/config.errors.js';
import type { ChatConfig } from '../config/configuration.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import type { SourceAttribution } from '../tools/tool.types.js';
import { CHAT_CONFIG } from './chat.constants.js';
import { GenerationError } from './chat.errors.js';
import type { ConversationTurn } from './session.service.js';

export const EMPTY_ANSWER = 'No response generated';

const FINAL_ANSWER_INSTRUCTION =
  'The tool budget for this question is used up. Answer now using only the information gathered above.';

export interface OrchestratedAnswer {
  answer: string;
  sources: SourceAttribution[];
}

/**
 * Runs the model with the course tools: every round executes the requested
 * tool calls and feeds the results back, until the model answers in plain
 * text or the round cap forces a final call without tools.
 */
@Injectable()
export class ToolOrchestratorService {
  private readonly logger = new Logger(ToolOrchestratorService.name);
  private readonly maxToolRounds: number;

  constructor(
    private readonly aiService: AIService,
    @Inject(CHAT_CONFIG) options: Pick<ChatConfig, 'maxToolRounds'>,
  ) {
    if (!Number.isInteger(options.maxToolRounds) || options.maxToolRounds < 1) {
      throw new ConfigurationError(
        `MAX_TOOL_ROUNDS must be a positive integer, received ${options.maxToolRounds}`,
      );
    }
    this.maxToolRounds = options.maxToolRounds;
  }

  async run(
    query: string,
    history: ConversationTurn[],
    registry: ToolRegistry,
  ): Promise<OrchestratedAnswer> {
    const messages: AiMessage[] = [
      { role: 'system', content: this.buildSystemPrompt() },
      ...this.transformHistory(history),
      { role: 'user', content: query },
    ];
    const tools = registry.getDefinitions();

    let response = await this.generate(messages, tools);
    for (let round = 1; response.toolCalls.length > 0; round++) {
      messages.push({
        role: 'assistant',
        content: response.content,
        toolCalls: response.toolCalls,
      });
      messages.push({
        role: 'tool',
        results: await this.executeToolCalls(response.toolCalls, registry),
      });

      if (round >= this.maxToolRounds) {
        this.logger.debug(
          `Tool round cap (${this.maxToolRounds}) reached, forcing a final answer`,
        );
        messages.push({ role: 'user', content: FINAL_ANSWER_INSTRUCTION });
        response = await this.generate(messages);
        break;
      }
      response = await this.generate(messages, tools);
    }

    const answer = response.content.trim();
    const sources = registry.getLastSources();
    registry.resetSources();

    return {
      answer: answer.length > 0 ? answer : EMPTY_ANSWER,
      sources,
    };
  }

  private async executeToolCalls(
    calls: AiToolCall[],
    registry: ToolRegistry,
  ): Promise<AiToolResult[]> {
    const results: AiToolResult[] = [];

    for (const call of calls) {
      try {
        const output = await registry.execute(call.name, call.input);
        results.push({ toolCallId: call.id, toolName: call.name, output });
      } catch (error) {
        // Embedding outages below a tool fail the query like a chat outage.
        if (error instanceof ProviderError) {
          throw toGenerationError(error);
        }
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Tool ${call.name} failed: ${message}`);
        results.push({
          toolCallId: call.id,
          toolName: call.name,
          output: `error: ${message}`,
          isError: true,
        });
      }
    }

    return results;
  }

  private async generate(
    messages: AiMessage[],
    tools?: AiToolDefinition[],
  ): Promise<GenerateTextResult> {
    try {
      return await this.aiService.generateText({
        messages: [...messages],
        tools: tools && tools.length > 0 ? tools : undefined,
      });
    } catch (error) {
      throw toGenerationError(error);
    }
  }

  private buildSystemPrompt(): string {
    return [
      'You are an assistant for questions about course materials and educational content.',
      'Two tools are available:',
      '- search_course_content: searches the text of the courses, optionally within one course or lesson.',
      '- get_course_outline: returns a course title, link, instructor and its numbered lesson list.',
      'Use get_course_outline for questions about what a course covers or how it is structured, and search_course_content for questions about specific material.',
      'General knowledge questions can be answered without tools.',
      'If a tool finds nothing, say so plainly instead of guessing.',
      'Answer directly. Do not describe your search process or mention the tools.',
      'Keep answers brief and accurate, with an example when it helps.',
    ].join('\n');
  }

  private transformHistory(history: ConversationTurn[]): AiMessage[] {
    return history.flatMap((turn): AiMessage[] => [
      { role: 'user', content: turn.user },
      { role: 'assistant', content: turn.assistant },
    ]);
  }
}

function toGenerationError(error: unknown): GenerationError {
  return new GenerationError(
    `Answer generation failed: ${
      error instanceof Error ? error.message : String(error)
    }`,
    { cause: error instanceof Error ? error : undefined },
  );
}
