import type { AiToolDefinition } from '../ai/ai.types.js';
import type { CourseTool, SourceAttribution } from './tool.types.js';

export class ToolRegistry {
  private readonly tools = new Map<string, CourseTool>();
  private lastExecuted: CourseTool | null = null;

  register(tool: CourseTool): void {
    const { name } = tool.definition;
    if (this.tools.has(name)) {
      throw new Error(`Tool '${name}' is already registered`);
    }
    this.tools.set(name, tool);
  }

  getDefinitions(): AiToolDefinition[] {
    return [...this.tools.values()].map((tool) => tool.definition);
  }

  execute(name: string, input: unknown): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      return Promise.resolve(`Tool '${name}' not found`);
    }
    this.lastExecuted = tool;
    return tool.execute(input);
  }

  /** Sources of the most recently executed tool, empty when it found nothing. */
  getLastSources(): SourceAttribution[] {
    return this.lastExecuted ? this.lastExecuted.getSources() : [];
  }

  resetSources(): void {
    this.lastExecuted = null;
    for (const tool of this.tools.values()) {
      tool.resetSources();
    }
  }
}
