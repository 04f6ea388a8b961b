import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module.js';
import {
  requireConfig,
  resolveLogLevels,
  type AppConfig,
} from './config/index.js';
import { CourseIngestionService } from './courses/index.js';

async function bootstrap() {
  const nodeEnv = process.env.NODE_ENV ?? 'development';

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: resolveLogLevels(nodeEnv),
  });
  app.enableCors();
  app.enableShutdownHooks();

  const configService = app.get<ConfigService<AppConfig>>(ConfigService);
  const ingestion = requireConfig(configService, 'ingestion');

  if (ingestion.onStartup) {
    const ingestionService = app.get(CourseIngestionService);
    if (await ingestionService.pathExists(ingestion.docsPath)) {
      const report = await ingestionService.ingestPath(ingestion.docsPath);
      Logger.log(
        `Startup ingestion: ${report.coursesAdded} courses, ${report.chunksAdded} chunks`,
        'Bootstrap',
      );
    } else {
      Logger.warn(
        `Course folder ${ingestion.docsPath} not found, skipping startup ingestion`,
        'Bootstrap',
      );
    }
  }

  const { port } = requireConfig(configService, 'app');

  try {
    await app.listen(port);
    Logger.log(
      `HTTP server listening on port ${port} (env: ${nodeEnv})`,
      'Bootstrap',
    );
  } catch (error) {
    if (
      typeof error === 'object' &&
      error !== null &&
      'code' in error &&
      error.code === 'EADDRINUSE'
    ) {
      Logger.error(
        `Port ${port} is already in use. Stop the other instance or change PORT.`,
        'Bootstrap',
      );
      process.exit(1);
    }
    throw error;
  }
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    `Bootstrap failed: ${error instanceof Error ? error.message : String(error)}`,
    error instanceof Error ? error.stack : undefined,
    'Bootstrap',
  );
  process.exit(1);
});
