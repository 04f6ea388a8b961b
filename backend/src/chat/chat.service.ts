import { Injectable, Logger } from '@nestjs/common';
import { VectorIndexService } from '../courses/vector-index.service.js';
import { ToolRegistryFactory } from '../tools/tool-registry.factory.js';
import type { SourceAttribution } from '../tools/tool.types.js';
import { SessionService } from './session.service.js';
import { ToolOrchestratorService } from './tool-orchestrator.service.js';

export interface QueryAnswer {
  answer: string;
  /** Source labels in the order the tool reported them. */
  sources: string[];
  citations: SourceAttribution[];
  sessionId: string;
}

export interface CourseStats {
  totalCourses: number;
  courseTitles: string[];
}

@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    private readonly sessions: SessionService,
    private readonly orchestrator: ToolOrchestratorService,
    private readonly registryFactory: ToolRegistryFactory,
    private readonly vectorIndex: VectorIndexService,
  ) {}

  async answer(query: string, sessionId?: string): Promise<QueryAnswer> {
    const id = sessionId ?? this.sessions.createSession();
    const history = this.sessions.getHistory(id);

    const { answer, sources } = await this.orchestrator.run(
      query,
      history,
      this.registryFactory.create(),
    );
    this.sessions.addExchange(id, query, answer);

    if (process.env.NODE_ENV === 'development') {
      this.logger.debug(
        `Session ${id}: answered with ${sources.length} sources (history ${history.length})`,
      );
    }

    return {
      answer,
      sources: sources.map((source) => source.label),
      citations: sources,
      sessionId: id,
    };
  }

  async getCourseStats(): Promise<CourseStats> {
    const courseTitles = await this.vectorIndex.listCourseTitles();
    return { totalCourses: courseTitles.length, courseTitles };
  }
}
