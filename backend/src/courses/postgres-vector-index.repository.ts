import { Logger } from '@nestjs/common';
import type { DatabaseService } from '../database/index.js';
import type {
  ChunkFilter,
  ChunkMatch,
  CourseMatch,
  CourseRecord,
  IndexedChunk,
  Lesson,
} from './course.types.js';
import type { VectorIndexRepository } from './vector-index.repository.js';

interface CourseRow {
  title: string;
  instructor: string | null;
  course_link: string | null;
  lessons: Lesson[] | null;
  embedding: string | number[] | null;
}

interface ChunkRow {
  id: string;
  course_title: string;
  lesson_number: number | null;
  chunk_index: number;
  content: string;
  start_offset: number;
  end_offset: number;
  embedding: string | number[] | null;
}

type ScoredCourseRow = CourseRow & { score: number | string };
type ScoredChunkRow = ChunkRow & { score: number | string };

const SCHEMA_STATEMENTS = [
  'CREATE EXTENSION IF NOT EXISTS vector',
  `CREATE TABLE IF NOT EXISTS course_catalog (
    collection TEXT NOT NULL,
    title TEXT NOT NULL,
    instructor TEXT,
    course_link TEXT,
    lessons JSONB NOT NULL DEFAULT '[]'::jsonb,
    embedding vector,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    PRIMARY KEY (collection, title)
  )`,
  `CREATE TABLE IF NOT EXISTS course_chunks (
    collection TEXT NOT NULL,
    id TEXT NOT NULL,
    course_title TEXT NOT NULL,
    lesson_number INTEGER,
    chunk_index INTEGER NOT NULL,
    content TEXT NOT NULL,
    start_offset INTEGER NOT NULL,
    end_offset INTEGER NOT NULL,
    embedding vector,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    PRIMARY KEY (collection, id)
  )`,
  `CREATE INDEX IF NOT EXISTS course_chunks_course_idx
    ON course_chunks (collection, course_title, chunk_index)`,
];

/**
 * pgvector-backed index. Every row is scoped by collection name so several
 * indexes can share one database.
 */
export class PostgresVectorIndexRepository implements VectorIndexRepository {
  private readonly logger = new Logger(PostgresVectorIndexRepository.name);
  private schemaReady: Promise<void> | null = null;

  constructor(
    private readonly database: DatabaseService,
    private readonly collection: string,
  ) {}

  async upsertCourse(
    course: CourseRecord,
    chunks: IndexedChunk[],
  ): Promise<void> {
    await this.ensureSchema();
    await this.database.withTransaction(async (client) => {
      await client.query(
        `INSERT INTO course_catalog (
          collection,
          title,
          instructor,
          course_link,
          lessons,
          embedding,
          updated_at
        )
        VALUES ($1, $2, $3, $4, $5::jsonb, $6::vector, NOW())
        ON CONFLICT (collection, title) DO UPDATE
        SET
          instructor = EXCLUDED.instructor,
          course_link = EXCLUDED.course_link,
          lessons = EXCLUDED.lessons,
          embedding = EXCLUDED.embedding,
          updated_at = NOW()`,
        [
          this.collection,
          course.title,
          course.instructor ?? null,
          course.link ?? null,
          JSON.stringify(course.lessons),
          toVectorLiteral(course.embedding),
        ],
      );
      await client.query(
        'DELETE FROM course_chunks WHERE collection = $1 AND course_title = $2',
        [this.collection, course.title],
      );

      for (const chunk of chunks) {
        await client.query(
          `INSERT INTO course_chunks (
            collection,
            id,
            course_title,
            lesson_number,
            chunk_index,
            content,
            start_offset,
            end_offset,
            embedding,
            updated_at
          )
          VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9::vector, NOW())
          ON CONFLICT (collection, id) DO UPDATE
          SET
            course_title = EXCLUDED.course_title,
            lesson_number = EXCLUDED.lesson_number,
            chunk_index = EXCLUDED.chunk_index,
            content = EXCLUDED.content,
            start_offset = EXCLUDED.start_offset,
            end_offset = EXCLUDED.end_offset,
            embedding = EXCLUDED.embedding,
            updated_at = NOW()`,
          [
            this.collection,
            chunk.id,
            chunk.courseTitle,
            chunk.lessonNumber,
            chunk.chunkIndex,
            chunk.text,
            chunk.start,
            chunk.end,
            toVectorLiteral(chunk.embedding),
          ],
        );
      }
    });
  }

  async searchChunks(
    embedding: number[],
    limit: number,
    filter: ChunkFilter,
  ): Promise<ChunkMatch[]> {
    await this.ensureSchema();
    const { rows } = await this.database.getPool().query<ScoredChunkRow>(
      `
      SELECT
        c.*,
        1 - (c.embedding <=> $2::vector) AS score
      FROM course_chunks c
      WHERE
        c.collection = $1
        AND c.embedding IS NOT NULL
        AND ($3::text IS NULL OR c.course_title = $3)
        AND ($4::integer IS NULL OR c.lesson_number = $4)
      ORDER BY c.embedding <=> $2::vector ASC, c.chunk_index ASC
      LIMIT $5
      `,
      [
        this.collection,
        toVectorLiteral(embedding),
        filter.courseTitle ?? null,
        filter.lessonNumber ?? null,
        limit,
      ],
    );

    return rows.map((row) => ({
      chunk: this.mapChunk(row),
      score: Number(row.score),
    }));
  }

  async searchCourses(
    embedding: number[],
    limit: number,
  ): Promise<CourseMatch[]> {
    await this.ensureSchema();
    const { rows } = await this.database.getPool().query<ScoredCourseRow>(
      `
      SELECT
        cc.*,
        1 - (cc.embedding <=> $2::vector) AS score
      FROM course_catalog cc
      WHERE cc.collection = $1 AND cc.embedding IS NOT NULL
      ORDER BY cc.embedding <=> $2::vector ASC
      LIMIT $3
      `,
      [this.collection, toVectorLiteral(embedding), limit],
    );

    return rows.map((row) => ({
      course: this.mapCourse(row),
      score: Number(row.score),
    }));
  }

  async getCourse(title: string): Promise<CourseRecord | null> {
    await this.ensureSchema();
    const { rows } = await this.database
      .getPool()
      .query<CourseRow>(
        'SELECT * FROM course_catalog WHERE collection = $1 AND title = $2',
        [this.collection, title],
      );
    const [row] = rows;
    return row ? this.mapCourse(row) : null;
  }

  async listCourses(): Promise<CourseRecord[]> {
    await this.ensureSchema();
    const { rows } = await this.database
      .getPool()
      .query<CourseRow>(
        'SELECT * FROM course_catalog WHERE collection = $1 ORDER BY title ASC',
        [this.collection],
      );
    return rows.map((row) => this.mapCourse(row));
  }

  async getChunkRange(
    courseTitle: string,
    lessonNumber: number | null,
    fromIndex: number,
    toIndex: number,
  ): Promise<IndexedChunk[]> {
    await this.ensureSchema();
    const { rows } = await this.database.getPool().query<ChunkRow>(
      `
      SELECT *
      FROM course_chunks
      WHERE
        collection = $1
        AND course_title = $2
        AND lesson_number IS NOT DISTINCT FROM $3::integer
        AND chunk_index BETWEEN $4 AND $5
      ORDER BY chunk_index ASC
      `,
      [this.collection, courseTitle, lessonNumber, fromIndex, toIndex],
    );
    return rows.map((row) => this.mapChunk(row));
  }

  async clear(): Promise<void> {
    await this.ensureSchema();
    await this.database.withTransaction(async (client) => {
      await client.query('DELETE FROM course_chunks WHERE collection = $1', [
        this.collection,
      ]);
      await client.query('DELETE FROM course_catalog WHERE collection = $1', [
        this.collection,
      ]);
    });
  }

  private ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.createSchema().catch((error: unknown) => {
        this.schemaReady = null;
        throw error;
      });
    }
    return this.schemaReady;
  }

  private async createSchema(): Promise<void> {
    const pool = this.database.getPool();
    for (const statement of SCHEMA_STATEMENTS) {
      await pool.query(statement);
    }
    this.logger.log(`pgvector schema ready (collection: ${this.collection})`);
  }

  private mapCourse(row: CourseRow): CourseRecord {
    return {
      title: row.title,
      ...(row.instructor ? { instructor: row.instructor } : {}),
      ...(row.course_link ? { link: row.course_link } : {}),
      lessons: row.lessons ?? [],
      embedding: parseVector(row.embedding),
    };
  }

  private mapChunk(row: ChunkRow): IndexedChunk {
    return {
      id: row.id,
      text: row.content,
      start: row.start_offset,
      end: row.end_offset,
      courseTitle: row.course_title,
      lessonNumber: row.lesson_number,
      chunkIndex: row.chunk_index,
      embedding: parseVector(row.embedding),
    };
  }
}

function toVectorLiteral(values?: number[] | null): string | null {
  if (!values || values.length === 0) {
    return null;
  }
  const joined = values.join(',');
  return `[${joined}]`;
}

function parseVector(value: string | number[] | null | undefined): number[] {
  if (!value) {
    return [];
  }
  if (Array.isArray(value)) {
    return value.map(number);
  }

  const trimmed = value.trim().replace(/^\[|\]$/g, '');
  if (!trimmed) {
    return [];
  }
  return trimmed.split(',').map(number);
}

function number(token: string | number): number {
  return typeof token === 'number' ? token : Number.parseFloat(token);
}
