export type ExternalProviderErrorCode =
  | 'UPSTREAM_CONNECTION_FAILED'
  | 'UPSTREAM_TIMEOUT'
  | 'UPSTREAM_BAD_STATUS'
  | 'UPSTREAM_INVALID_RESPONSE';

export class ExternalProviderError extends Error {
  readonly code: ExternalProviderErrorCode;

  readonly details?: unknown;

  constructor(code: ExternalProviderErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'ExternalProviderError';
    this.code = code;
    this.details = details;
  }
}
