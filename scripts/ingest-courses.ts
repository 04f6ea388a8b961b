#!/usr/bin/env node

import 'reflect-metadata';
import path from 'node:path';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import {
  requireConfig,
  resolveLogLevels,
  type AppConfig,
} from '../backend/src/config/index.js';
import { CourseIngestionService } from '../backend/src/courses/index.js';
import { IngestionModule } from './ingestion.module.js';

/**
 * Usage: ingest-courses [folder] [--clear] [--replace]
 *
 *   folder     course files to index (defaults to DOCS_PATH)
 *   --clear    drop the collection before ingesting
 *   --replace  re-index courses that are already present
 */
async function main() {
  const args = process.argv.slice(2);
  const flags = new Set(args.filter((arg) => arg.startsWith('--')));
  const [folderArg] = args.filter((arg) => !arg.startsWith('--'));

  const unknownFlags = [...flags].filter(
    (flag) => flag !== '--clear' && flag !== '--replace',
  );
  if (unknownFlags.length > 0) {
    throw new Error(`Unknown option(s): ${unknownFlags.join(', ')}`);
  }

  const app = await NestFactory.createApplicationContext(IngestionModule, {
    logger: resolveLogLevels(process.env.NODE_ENV ?? 'development'),
  });

  try {
    const configService = app.get<ConfigService<AppConfig>>(ConfigService);
    const folder = path.resolve(
      folderArg ?? requireConfig(configService, 'ingestion').docsPath,
    );

    const ingestion = app.get(CourseIngestionService);
    if (!(await ingestion.pathExists(folder))) {
      throw new Error(`Course folder not found: ${folder}`);
    }

    const report = await ingestion.ingestPath(folder, {
      clearExisting: flags.has('--clear'),
      replaceExisting: flags.has('--replace'),
    });

    console.log(
      `Added ${report.coursesAdded} courses (${report.chunksAdded} chunks)`,
    );
    if (report.skipped.length > 0) {
      console.log(`Skipped (already indexed): ${report.skipped.join(', ')}`);
    }
    for (const failure of report.failed) {
      console.log(`Failed: ${failure.file} - ${failure.reason}`);
    }
    if (report.failed.length > 0) {
      process.exitCode = 1;
    }
  } finally {
    await app.close();
  }
}

main().catch((error: unknown) => {
  Logger.error(
    error instanceof Error ? error.message : String(error),
    error instanceof Error ? error.stack : undefined,
    'IngestCourses',
  );
  process.exit(1);
});
