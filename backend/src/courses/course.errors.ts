export type SearchErrorCode = 'INVALID_RESULT_LIMIT' | 'INDEX_QUERY_FAILED';

export class SearchError extends Error {
  public readonly code: SearchErrorCode;
  public readonly cause?: Error;

  constructor(
    code: SearchErrorCode,
    message: string,
    options?: { cause?: Error },
  ) {
    super(message);
    this.code = code;
    this.name = 'SearchError';
    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}

export class CourseDocumentError extends Error {
  public readonly code = 'MALFORMED_COURSE_DOCUMENT';
  public readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.source = source;
    this.name = 'CourseDocumentError';
  }
}
