export class ConfigurationError extends Error {
  public readonly code = 'INVALID_CONFIGURATION';
  public readonly cause?: Error;

  constructor(message: string, options?: { cause?: Error }) {
    super(message);
    this.name = 'ConfigurationError';
    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}
