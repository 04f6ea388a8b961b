import { Inject, Injectable, Logger } from '@nestjs/common';
import { AIService } from '../ai/ai.service.js';
import { ConfigurationError } from '../config/config.errors.js';
import type { RetrievalConfig } from '../config/configuration.js';
import { mergeSegments } from './course-chunker.js';
import { SearchError } from './course.errors.js';
import {
  chunkId,
  type Course,
  type CourseChunk,
  type CourseRecord,
  type IndexedChunk,
  type SearchQueryOptions,
  type SearchResult,
} from './course.types.js';
import {
  RETRIEVAL_CONFIG,
  VECTOR_INDEX_REPOSITORY,
} from './courses.constants.js';
import type { VectorIndexRepository } from './vector-index.repository.js';

export type VectorIndexOptions = Pick<
  RetrievalConfig,
  'maxResults' | 'courseMatchMinScore'
>;

/**
 * Owns embeddings and the persisted course/chunk index. Search limits are
 * validated here, before the embedding provider or the store is reached.
 */
@Injectable()
export class VectorIndexService {
  private readonly logger = new Logger(VectorIndexService.name);
  private readonly maxResults: number;
  private readonly courseMatchMinScore: number;

  constructor(
    private readonly aiService: AIService,
    @Inject(VECTOR_INDEX_REPOSITORY)
    private readonly repository: VectorIndexRepository,
    @Inject(RETRIEVAL_CONFIG) options: VectorIndexOptions,
  ) {
    if (!isPositiveInteger(options.maxResults)) {
      throw new ConfigurationError(
        `MAX_RESULTS must be a positive integer, received ${options.maxResults}`,
      );
    }
    this.maxResults = options.maxResults;
    this.courseMatchMinScore = options.courseMatchMinScore;
  }

  async upsert(course: Course, chunks: CourseChunk[]): Promise<number> {
    const foreign = chunks.find((chunk) => chunk.courseTitle !== course.title);
    if (foreign) {
      throw new Error(
        `Chunk ${foreign.chunkIndex} belongs to "${foreign.courseTitle}", not "${course.title}"`,
      );
    }

    const { embeddings } = await this.aiService.embedText({
      inputs: [course.title, ...chunks.map((chunk) => chunk.text)],
    });
    if (embeddings.length !== chunks.length + 1) {
      throw new Error(
        `Expected ${chunks.length + 1} embeddings for "${course.title}", received ${embeddings.length}`,
      );
    }

    const [titleEmbedding, ...chunkEmbeddings] = embeddings;
    const record: CourseRecord = { ...course, embedding: titleEmbedding };
    const indexed: IndexedChunk[] = chunks.map((chunk, index) => ({
      ...chunk,
      id: chunkId(course.title, chunk.chunkIndex),
      embedding: chunkEmbeddings[index],
    }));

    await this.repository.upsertCourse(record, indexed);
    this.logger.log(
      `Indexed "${course.title}" (${course.lessons.length} lessons, ${indexed.length} chunks)`,
    );
    return indexed.length;
  }

  async query(
    text: string,
    options: SearchQueryOptions = {},
  ): Promise<SearchResult[]> {
    const limit = options.limit ?? this.maxResults;
    if (!isPositiveInteger(limit)) {
      throw new SearchError(
        'INVALID_RESULT_LIMIT',
        `Search result limit must be a positive integer, received ${limit}`,
      );
    }

    const embedding = await this.aiService.embedOne(text);

    try {
      const matches = await this.repository.searchChunks(embedding, limit, {
        courseTitle: options.courseTitle,
        lessonNumber: options.lessonNumber,
      });
      return matches.map(({ chunk, score }) => ({
        chunkId: chunk.id,
        text: chunk.text,
        courseTitle: chunk.courseTitle,
        lessonNumber: chunk.lessonNumber,
        chunkIndex: chunk.chunkIndex,
        score,
        distance: 1 - score,
      }));
    } catch (error) {
      throw new SearchError(
        'INDEX_QUERY_FAILED',
        `Vector index query failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
        { cause: error instanceof Error ? error : undefined },
      );
    }
  }

  /**
   * Maps a partial or loosely spelled course name onto an indexed title:
   * exact (case-insensitive) match, then a unique containment match, then the
   * nearest title embedding if it clears the configured similarity.
   */
  async resolveCourseTitle(name: string): Promise<string | null> {
    const wanted = name.trim().toLowerCase();
    if (wanted.length === 0) {
      return null;
    }

    const titles = await this.listCourseTitles();
    const exact = titles.find((title) => title.toLowerCase() === wanted);
    if (exact) {
      return exact;
    }

    const containing = titles.filter((title) => {
      const candidate = title.toLowerCase();
      return candidate.includes(wanted) || wanted.includes(candidate);
    });
    if (containing.length === 1) {
      return containing[0];
    }

    if (titles.length === 0) {
      return null;
    }
    const embedding = await this.aiService.embedOne(name);
    const [nearest] = await this.repository.searchCourses(embedding, 1);
    if (nearest && nearest.score >= this.courseMatchMinScore) {
      return nearest.course.title;
    }

    this.logger.debug(
      `No course matches "${name}" (best score ${nearest?.score.toFixed(3) ?? 'n/a'})`,
    );
    return null;
  }

  async listCourseTitles(): Promise<string[]> {
    const courses = await this.repository.listCourses();
    return courses
      .map((course) => course.title)
      .sort((a, b) => a.localeCompare(b));
  }

  async getCourse(title: string): Promise<Course | null> {
    const record = await this.repository.getCourse(title);
    if (!record) {
      return null;
    }
    const { title: courseTitle, instructor, link, lessons } = record;
    return { title: courseTitle, instructor, link, lessons };
  }

  /**
   * Text of a search hit widened by up to `radius` neighbouring chunks on each
   * side, restricted to the hit's lesson, with overlap removed.
   */
  async expandContext(result: SearchResult, radius: number): Promise<string> {
    if (radius <= 0) {
      return result.text;
    }
    const neighbours = await this.repository.getChunkRange(
      result.courseTitle,
      result.lessonNumber,
      result.chunkIndex - radius,
      result.chunkIndex + radius,
    );
    return neighbours.length > 0 ? mergeSegments(neighbours) : result.text;
  }

  async clear(): Promise<void> {
    await this.repository.clear();
    this.logger.warn('Vector index cleared');
  }
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
