export type ProviderErrorCode = 'PROVIDER_REQUEST_FAILED' | 'PROVIDER_TIMEOUT';

export class ProviderError extends Error {
  public readonly code: ProviderErrorCode;
  public readonly provider: string;
  public readonly cause?: Error;

  constructor(
    code: ProviderErrorCode,
    provider: string,
    message: string,
    options?: { cause?: Error },
  ) {
    super(message);
    this.code = code;
    this.provider = provider;
    this.name = 'ProviderError';
    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}
