import type { AiToolDefinition } from '../ai/ai.types.js';

export interface SourceAttribution {
  label: string;
  url?: string;
}

/**
 * A capability the model may call during a query. Tools keep the sources of
 * their most recent invocation until `resetSources` is called.
 */
export interface CourseTool {
  readonly definition: AiToolDefinition;
  /** Never throws for bad arguments; those come back as text for the model. */
  execute(input: unknown): Promise<string>;
  getSources(): SourceAttribution[];
  resetSources(): void;
}
