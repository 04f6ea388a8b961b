import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AiModule } from '../ai/index.js';
import {
  requireConfig,
  type AppConfig,
  type VectorStoreConfig,
} from '../config/index.js';
import { DatabaseModule, DatabaseService } from '../database/index.js';
import { CourseChunker } from './course-chunker.js';
import { CourseIngestionService } from './course-ingestion.service.js';
import {
  INGESTION_CONFIG,
  RETRIEVAL_CONFIG,
  VECTOR_INDEX_REPOSITORY,
  VECTOR_STORE_CONFIG,
} from './courses.constants.js';
import { FileVectorIndexRepository } from './file-vector-index.repository.js';
import { PostgresVectorIndexRepository } from './postgres-vector-index.repository.js';
import type { VectorIndexRepository } from './vector-index.repository.js';
import { VectorIndexService } from './vector-index.service.js';

@Module({
  imports: [AiModule, DatabaseModule],
  providers: [
    {
      provide: RETRIEVAL_CONFIG,
      useFactory: (configService: ConfigService<AppConfig>) =>
        requireConfig(configService, 'retrieval'),
      inject: [ConfigService],
    },
    {
      provide: VECTOR_STORE_CONFIG,
      useFactory: (configService: ConfigService<AppConfig>) =>
        requireConfig(configService, 'vectorStore'),
      inject: [ConfigService],
    },
    {
      provide: INGESTION_CONFIG,
      useFactory: (configService: ConfigService<AppConfig>) =>
        requireConfig(configService, 'ingestion'),
      inject: [ConfigService],
    },
    {
      provide: VECTOR_INDEX_REPOSITORY,
      useFactory: (
        store: VectorStoreConfig,
        database: DatabaseService,
      ): VectorIndexRepository => {
        switch (store.driver) {
          case 'file':
            return new FileVectorIndexRepository({
              directory: store.path,
              collection: store.collection,
            });
          case 'postgres':
            return new PostgresVectorIndexRepository(
              database,
              store.collection,
            );
          default: {
            const driver: string = store.driver;
            throw new Error(`Unsupported vector store: ${driver}`);
          }
        }
      },
      inject: [VECTOR_STORE_CONFIG, DatabaseService],
    },
    CourseChunker,
    VectorIndexService,
    CourseIngestionService,
  ],
  exports: [
    RETRIEVAL_CONFIG,
    INGESTION_CONFIG,
    VectorIndexService,
    CourseIngestionService,
  ],
})
export class CoursesModule {}
