export type ChatErrorCode = 'GENERATION_FAILED';

export class GenerationError extends Error {
  public readonly code: ChatErrorCode = 'GENERATION_FAILED';
  public readonly cause?: Error;

  constructor(message: string, options?: { cause?: Error }) {
    super(message);
    this.name = 'GenerationError';
    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}
