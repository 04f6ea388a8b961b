import type { ZodType } from 'zod';

export type AiMessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface AiToolCall {
  id: string;
  name: string;
  input: unknown;
}

export interface AiToolResult {
  toolCallId: string;
  toolName: string;
  output: string;
  isError?: boolean;
}

export type AiMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: AiToolCall[] }
  | { role: 'tool'; results: AiToolResult[] };

/**
 * Capability descriptor handed to the model. `parameters` is the schema the
 * model's arguments are expected to satisfy.
 */
export interface AiToolDefinition {
  name: string;
  description: string;
  parameters: ZodType;
}

export interface GenerateTextOptions {
  model?: string;
  messages: AiMessage[];
  temperature?: number;
  maxTokens?: number;
  tools?: AiToolDefinition[];
}

export interface GenerateTextResult {
  content: string;
  toolCalls: AiToolCall[];
}

export interface EmbedTextOptions {
  model?: string;
  inputs: string[];
}

export interface EmbedTextResult {
  embeddings: number[][];
}
