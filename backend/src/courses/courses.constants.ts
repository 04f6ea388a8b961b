export const RETRIEVAL_CONFIG = Symbol('RETRIEVAL_CONFIG');
export const VECTOR_STORE_CONFIG = Symbol('VECTOR_STORE_CONFIG');
export const INGESTION_CONFIG = Symbol('INGESTION_CONFIG');
export const VECTOR_INDEX_REPOSITORY = Symbol('VECTOR_INDEX_REPOSITORY');

export const COURSE_FILE_EXTENSIONS = ['.txt', '.md'] as const;
