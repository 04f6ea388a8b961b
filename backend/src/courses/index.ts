export { CoursesModule } from './courses.module.js';
export { CourseChunker, mergeSegments } from './course-chunker.js';
export { parseCourseDocument } from './course-document.parser.js';
export {
  CourseIngestionService,
  type IngestionReport,
  type IngestPathOptions,
} from './course-ingestion.service.js';
export { VectorIndexService } from './vector-index.service.js';
export { CourseDocumentError, SearchError } from './course.errors.js';
export { INGESTION_CONFIG, RETRIEVAL_CONFIG } from './courses.constants.js';
export * from './course.types.js';
