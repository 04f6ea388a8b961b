import { Inject, Injectable } from '@nestjs/common';
import { ConfigurationError } from '../config/config.errors.js';
import type { RetrievalConfig } from '../config/configuration.js';
import { RETRIEVAL_CONFIG } from './courses.constants.js';
import type {
  CourseChunk,
  CourseDocument,
  TextSegment,
} from './course.types.js';

export type ChunkerOptions = Pick<RetrievalConfig, 'chunkSize' | 'chunkOverlap'>;

const SENTENCE_END_PATTERN = /[.!?]+(?=\s|$)/g;

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Rebuilds the text covered by consecutive segments of one lesson, dropping
 * the characters each segment shares with its predecessor.
 */
export function mergeSegments(segments: readonly TextSegment[]): string {
  let merged = '';
  let previousEnd: number | null = null;

  for (const segment of segments) {
    if (previousEnd === null) {
      merged = segment.text;
    } else {
      const shared = Math.max(0, previousEnd - segment.start);
      const separator = segment.start > previousEnd ? ' ' : '';
      merged += separator + segment.text.slice(shared);
    }
    previousEnd = Math.max(previousEnd ?? 0, segment.end);
  }

  return merged;
}

@Injectable()
export class CourseChunker {
  private readonly chunkSize: number;
  private readonly overlap: number;

  constructor(@Inject(RETRIEVAL_CONFIG) options: ChunkerOptions) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
      throw new ConfigurationError(
        `CHUNK_SIZE must be a positive integer, received ${options.chunkSize}`,
      );
    }
    if (
      !Number.isInteger(options.chunkOverlap) ||
      options.chunkOverlap < 0 ||
      options.chunkOverlap >= options.chunkSize
    ) {
      throw new ConfigurationError(
        `CHUNK_OVERLAP must be an integer in [0, ${options.chunkSize}), received ${options.chunkOverlap}`,
      );
    }
    this.chunkSize = options.chunkSize;
    this.overlap = options.chunkOverlap;
  }

  /**
   * Chunks every lesson of a parsed course. Chunk indexes run across the whole
   * course; course-level text comes first with a null lesson number.
   */
  chunkCourse(document: CourseDocument): CourseChunk[] {
    const chunks: CourseChunk[] = [];
    const courseTitle = document.course.title;

    const append = (text: string, lessonNumber: number | null) => {
      for (const segment of this.splitText(text)) {
        chunks.push({
          ...segment,
          courseTitle,
          lessonNumber,
          chunkIndex: chunks.length,
        });
      }
    };

    append(document.preamble, null);
    for (const lesson of document.lessons) {
      append(lesson.content, lesson.number);
    }

    return chunks;
  }

  splitText(text: string): TextSegment[] {
    const normalized = normalizeWhitespace(text);
    if (normalized.length === 0) {
      return [];
    }
    if (normalized.length <= this.chunkSize) {
      return [{ text: normalized, start: 0, end: normalized.length }];
    }

    const boundaries = sentenceBoundaries(normalized);
    const segments: TextSegment[] = [];
    let start = 0;

    while (start < normalized.length) {
      const end = this.findSegmentEnd(normalized, start, boundaries);
      segments.push({ text: normalized.slice(start, end), start, end });
      if (end >= normalized.length) {
        break;
      }
      start = this.findNextStart(normalized, end);
    }

    return segments;
  }

  private findSegmentEnd(
    text: string,
    start: number,
    boundaries: number[],
  ): number {
    const limit = start + this.chunkSize;
    if (limit >= text.length) {
      return text.length;
    }

    // The segment must reach past the part the next segment re-reads, and a
    // sentence break is only taken when it keeps at least half the chunk.
    const wordFloor = start + this.overlap;
    const sentenceFloor = start + Math.max(this.overlap, this.chunkSize / 2);

    for (let i = boundaries.length - 1; i >= 0; i--) {
      const boundary = boundaries[i];
      if (boundary <= sentenceFloor) {
        break;
      }
      if (boundary <= limit) {
        return boundary;
      }
    }

    const space = text.lastIndexOf(' ', limit);
    if (space > wordFloor) {
      return space;
    }

    return limit;
  }

  private findNextStart(text: string, end: number): number {
    let next = end - this.overlap;

    if (next < end && next > 0 && text[next - 1] !== ' ') {
      const space = text.indexOf(' ', next);
      next = space === -1 || space >= end ? end : space + 1;
    }
    while (next < text.length && text[next] === ' ') {
      next++;
    }

    return next;
  }
}

function sentenceBoundaries(text: string): number[] {
  const boundaries: number[] = [];
  for (const match of text.matchAll(SENTENCE_END_PATTERN)) {
    boundaries.push((match.index ?? 0) + match[0].length);
  }
  return boundaries;
}
