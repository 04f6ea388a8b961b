import { Module } from '@nestjs/common';
import { AppConfigModule } from '../backend/src/config/index.js';
import { CoursesModule } from '../backend/src/courses/index.js';

// Application context for the ingestion CLI
@Module({
  imports: [AppConfigModule, CoursesModule],
})
export class IngestionModule {}
