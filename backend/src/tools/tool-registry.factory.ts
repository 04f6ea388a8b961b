import { Inject, Injectable } from '@nestjs/common';
import type { RetrievalConfig } from '../config/configuration.js';
import { RETRIEVAL_CONFIG } from '../courses/courses.constants.js';
import { VectorIndexService } from '../courses/vector-index.service.js';
import { CourseOutlineTool } from './course-outline.tool.js';
import { CourseSearchTool } from './course-search.tool.js';
import { ToolRegistry } from './tool-registry.js';

/**
 * Builds a registry with fresh tool instances. Each query gets its own, so
 * the sources one query collects are never visible to another.
 */
@Injectable()
export class ToolRegistryFactory {
  constructor(
    private readonly vectorIndex: VectorIndexService,
    @Inject(RETRIEVAL_CONFIG)
    private readonly retrieval: Pick<RetrievalConfig, 'contextWindow'>,
  ) {}

  create(): ToolRegistry {
    const registry = new ToolRegistry();
    registry.register(
      new CourseSearchTool(this.vectorIndex, {
        contextWindow: this.retrieval.contextWindow,
      }),
    );
    registry.register(new CourseOutlineTool(this.vectorIndex));
    return registry;
  }
}
