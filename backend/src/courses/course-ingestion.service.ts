import { Injectable, Logger } from '@nestjs/common';
import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { CourseChunker } from './course-chunker.js';
import { parseCourseDocument } from './course-document.parser.js';
import { CourseDocumentError } from './course.errors.js';
import { COURSE_FILE_EXTENSIONS } from './courses.constants.js';
import { VectorIndexService } from './vector-index.service.js';

export interface IngestPathOptions {
  /** Drop the whole collection before ingesting. */
  clearExisting?: boolean;
  /** Re-index courses whose title is already present instead of skipping them. */
  replaceExisting?: boolean;
}

export interface IngestionFailure {
  file: string;
  reason: string;
}

export interface IngestionReport {
  coursesAdded: number;
  chunksAdded: number;
  skipped: string[];
  failed: IngestionFailure[];
}

export type IngestDocumentOutcome =
  | { status: 'indexed'; courseTitle: string; chunkCount: number }
  | { status: 'skipped'; courseTitle: string };

@Injectable()
export class CourseIngestionService {
  private readonly logger = new Logger(CourseIngestionService.name);

  constructor(
    private readonly chunker: CourseChunker,
    private readonly vectorIndex: VectorIndexService,
  ) {}

  async pathExists(folder: string): Promise<boolean> {
    try {
      return (await stat(folder)).isDirectory();
    } catch (error) {
      this.logger.debug(
        `Course folder ${folder} is not accessible: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      return false;
    }
  }

  /**
   * Indexes every course file in `folder`. A file that cannot be parsed or
   * indexed is reported and the batch carries on.
   */
  async ingestPath(
    folder: string,
    options: IngestPathOptions = {},
  ): Promise<IngestionReport> {
    const report: IngestionReport = {
      coursesAdded: 0,
      chunksAdded: 0,
      skipped: [],
      failed: [],
    };

    if (options.clearExisting) {
      await this.vectorIndex.clear();
    }

    const entries = await readdir(folder, { withFileTypes: true });
    const files = entries
      .filter(
        (entry) =>
          entry.isFile() &&
          COURSE_FILE_EXTENSIONS.some(
            (extension) => path.extname(entry.name).toLowerCase() === extension,
          ),
      )
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b));

    const knownTitles = new Set(await this.vectorIndex.listCourseTitles());

    for (const file of files) {
      const filePath = path.join(folder, file);
      try {
        const raw = await readFile(filePath, 'utf-8');
        const outcome = await this.ingestDocument(raw, file, {
          knownTitles,
          replaceExisting: options.replaceExisting,
        });
        if (outcome.status === 'skipped') {
          report.skipped.push(outcome.courseTitle);
          continue;
        }
        report.coursesAdded++;
        report.chunksAdded += outcome.chunkCount;
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        report.failed.push({ file, reason });
        if (error instanceof CourseDocumentError) {
          this.logger.warn(`Skipping malformed course file: ${reason}`);
        } else {
          this.logger.error(
            `Failed to ingest ${file}: ${reason}`,
            error instanceof Error ? error.stack : undefined,
          );
        }
      }
    }

    this.logger.log(
      `Ingested ${report.coursesAdded} courses (${report.chunksAdded} chunks) from ${folder}; skipped ${report.skipped.length}, failed ${report.failed.length}`,
    );
    return report;
  }

  async ingestDocument(
    raw: string,
    source: string,
    options: { knownTitles?: Set<string>; replaceExisting?: boolean } = {},
  ): Promise<IngestDocumentOutcome> {
    const document = parseCourseDocument(raw, source);
    const courseTitle = document.course.title;
    const knownTitles =
      options.knownTitles ?? new Set(await this.vectorIndex.listCourseTitles());

    if (knownTitles.has(courseTitle) && !options.replaceExisting) {
      this.logger.debug(`Course "${courseTitle}" already indexed, skipping`);
      return { status: 'skipped', courseTitle };
    }

    const chunks = this.chunker.chunkCourse(document);
    const chunkCount = await this.vectorIndex.upsert(document.course, chunks);
    knownTitles.add(courseTitle);
    return { status: 'indexed', courseTitle, chunkCount };
  }
}
