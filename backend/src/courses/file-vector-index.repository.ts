import { Logger } from '@nestjs/common';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type {
  ChunkFilter,
  ChunkMatch,
  CourseMatch,
  CourseRecord,
  IndexedChunk,
} from './course.types.js';
import type { VectorIndexRepository } from './vector-index.repository.js';
import { cosineSimilarity } from './vector-math.js';

const INDEX_FILE_VERSION = 1;

const lessonSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  link: z.string().optional(),
});

const courseRecordSchema = z.object({
  title: z.string().min(1),
  instructor: z.string().optional(),
  link: z.string().optional(),
  lessons: z.array(lessonSchema),
  embedding: z.array(z.number()),
});

const indexedChunkSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  courseTitle: z.string().min(1),
  lessonNumber: z.number().int().nullable(),
  chunkIndex: z.number().int().nonnegative(),
  embedding: z.array(z.number()),
});

const indexFileSchema = z.object({
  version: z.literal(INDEX_FILE_VERSION),
  collection: z.string(),
  courses: z.array(courseRecordSchema),
  chunks: z.array(indexedChunkSchema),
});

interface IndexSnapshot {
  courses: readonly CourseRecord[];
  chunks: readonly IndexedChunk[];
}

export interface FileVectorIndexOptions {
  directory: string;
  collection: string;
}

/**
 * Vector index persisted as one JSON file per collection.
 *
 * Reads are served from an immutable in-memory snapshot; writes are queued,
 * build a new snapshot, persist it through a temp file + rename and only then
 * swap it in, so in-flight reads never observe a half-applied upsert.
 */
export class FileVectorIndexRepository implements VectorIndexRepository {
  private readonly logger = new Logger(FileVectorIndexRepository.name);
  private readonly filePath: string;
  private snapshot: IndexSnapshot | null = null;
  private loading: Promise<IndexSnapshot> | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(private readonly options: FileVectorIndexOptions) {
    this.filePath = path.resolve(
      options.directory,
      `${options.collection}.json`,
    );
  }

  get location(): string {
    return this.filePath;
  }

  upsertCourse(course: CourseRecord, chunks: IndexedChunk[]): Promise<void> {
    return this.enqueueWrite((current) => ({
      courses: [
        ...current.courses.filter(
          (existing) => existing.title !== course.title,
        ),
        course,
      ],
      chunks: [
        ...current.chunks.filter(
          (existing) => existing.courseTitle !== course.title,
        ),
        ...chunks,
      ],
    }));
  }

  async searchChunks(
    embedding: number[],
    limit: number,
    filter: ChunkFilter,
  ): Promise<ChunkMatch[]> {
    const { chunks } = await this.read();

    return chunks
      .filter(
        (chunk) =>
          (filter.courseTitle === undefined ||
            chunk.courseTitle === filter.courseTitle) &&
          (filter.lessonNumber === undefined ||
            chunk.lessonNumber === filter.lessonNumber),
      )
      .map((chunk) => ({
        chunk,
        score: cosineSimilarity(embedding, chunk.embedding),
      }))
      .sort(
        (a, b) =>
          b.score - a.score || a.chunk.chunkIndex - b.chunk.chunkIndex,
      )
      .slice(0, limit);
  }

  async searchCourses(
    embedding: number[],
    limit: number,
  ): Promise<CourseMatch[]> {
    const { courses } = await this.read();

    return courses
      .map((course) => ({
        course,
        score: cosineSimilarity(embedding, course.embedding),
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }

  async getCourse(title: string): Promise<CourseRecord | null> {
    const { courses } = await this.read();
    return courses.find((course) => course.title === title) ?? null;
  }

  async listCourses(): Promise<CourseRecord[]> {
    const { courses } = await this.read();
    return [...courses];
  }

  async getChunkRange(
    courseTitle: string,
    lessonNumber: number | null,
    fromIndex: number,
    toIndex: number,
  ): Promise<IndexedChunk[]> {
    const { chunks } = await this.read();

    return chunks
      .filter(
        (chunk) =>
          chunk.courseTitle === courseTitle &&
          chunk.lessonNumber === lessonNumber &&
          chunk.chunkIndex >= fromIndex &&
          chunk.chunkIndex <= toIndex,
      )
      .sort((a, b) => a.chunkIndex - b.chunkIndex);
  }

  clear(): Promise<void> {
    return this.enqueueWrite(() => ({ courses: [], chunks: [] }));
  }

  private read(): Promise<IndexSnapshot> {
    if (this.snapshot) {
      return Promise.resolve(this.snapshot);
    }
    if (!this.loading) {
      this.loading = this.load().then(
        (snapshot) => {
          this.snapshot = snapshot;
          return snapshot;
        },
        (error: unknown) => {
          // a failed load is retried on the next read
          this.loading = null;
          throw error;
        },
      );
    }
    return this.loading;
  }

  private async load(): Promise<IndexSnapshot> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return { courses: [], chunks: [] };
      }
      throw error;
    }

    const parsed = indexFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(
        `Vector index file ${this.filePath} is invalid: ${parsed.error.message}`,
      );
    }
    if (parsed.data.collection !== this.options.collection) {
      this.logger.warn(
        `Index file ${this.filePath} was written for collection "${parsed.data.collection}"`,
      );
    }

    this.logger.log(
      `Loaded ${parsed.data.courses.length} courses / ${parsed.data.chunks.length} chunks from ${this.filePath}`,
    );
    return { courses: parsed.data.courses, chunks: parsed.data.chunks };
  }

  private enqueueWrite(
    update: (current: IndexSnapshot) => IndexSnapshot,
  ): Promise<void> {
    const run = this.writeQueue.then(async () => {
      const current = await this.read();
      const next = update(current);
      await this.persist(next);
      this.snapshot = next;
    });

    // Keep the queue alive after a failed write; the caller still sees the rejection
    this.writeQueue = run.catch((error: unknown) => {
      this.logger.error(
        `Vector index write failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    });
    return run;
  }

  private async persist(snapshot: IndexSnapshot): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    const payload = {
      version: INDEX_FILE_VERSION,
      collection: this.options.collection,
      courses: snapshot.courses,
      chunks: snapshot.chunks,
    };
    await writeFile(tempPath, JSON.stringify(payload), 'utf-8');
    await rename(tempPath, this.filePath);
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
