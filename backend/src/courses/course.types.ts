export interface Lesson {
  number: number;
  title: string;
  link?: string;
}

export interface Course {
  title: string;
  instructor?: string;
  link?: string;
  lessons: Lesson[];
}

export interface LessonDocument extends Lesson {
  content: string;
}

/**
 * A parsed course file. `preamble` is course-level text found before the
 * first lesson header.
 */
export interface CourseDocument {
  course: Course;
  preamble: string;
  lessons: LessonDocument[];
}

/** Span of whitespace-normalised text; `end` is exclusive. */
export interface TextSegment {
  text: string;
  start: number;
  end: number;
}

export interface CourseChunk extends TextSegment {
  courseTitle: string;
  lessonNumber: number | null;
  chunkIndex: number;
}

export interface IndexedChunk extends CourseChunk {
  id: string;
  embedding: number[];
}

export interface CourseRecord extends Course {
  embedding: number[];
}

export interface ChunkFilter {
  courseTitle?: string;
  lessonNumber?: number;
}

export interface ChunkMatch {
  chunk: IndexedChunk;
  score: number;
}

export interface CourseMatch {
  course: CourseRecord;
  score: number;
}

export interface SearchResult {
  chunkId: string;
  text: string;
  courseTitle: string;
  lessonNumber: number | null;
  chunkIndex: number;
  /** Cosine similarity, higher is more relevant. */
  score: number;
  distance: number;
}

export interface SearchQueryOptions extends ChunkFilter {
  limit?: number;
}

export function chunkId(courseTitle: string, chunkIndex: number): string {
  return `${courseTitle}::${chunkIndex}`;
}
