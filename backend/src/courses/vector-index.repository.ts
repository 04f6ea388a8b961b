import type {
  ChunkFilter,
  ChunkMatch,
  CourseMatch,
  CourseRecord,
  IndexedChunk,
} from './course.types.js';

export interface VectorIndexRepository {
  /** Replaces the course record and every chunk previously stored for it. */
  upsertCourse(course: CourseRecord, chunks: IndexedChunk[]): Promise<void>;
  searchChunks(
    embedding: number[],
    limit: number,
    filter: ChunkFilter,
  ): Promise<ChunkMatch[]>;
  searchCourses(embedding: number[], limit: number): Promise<CourseMatch[]>;
  getCourse(title: string): Promise<CourseRecord | null>;
  listCourses(): Promise<CourseRecord[]>;
  /** Chunks of one lesson whose index lies in `[fromIndex, toIndex]`, ordered. */
  getChunkRange(
    courseTitle: string,
    lessonNumber: number | null,
    fromIndex: number,
    toIndex: number,
  ): Promise<IndexedChunk[]>;
  clear(): Promise<void>;
}
