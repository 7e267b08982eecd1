import { ExternalProviderError } from './ExternalProviderError.js';

export class AppError extends Error {
  readonly statusCode: number;

  readonly code?: string;

  readonly details?: unknown;

  constructor(message: string, statusCode = 500, options?: { code?: string; details?: unknown }) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = options?.code;
    this.details = options?.details;
  }

  static fromUpstream(error: ExternalProviderError): AppError {
    const statusCode = error.code === 'UPSTREAM_TIMEOUT' ? 504 : 502;
    return new AppError(error.message, statusCode, { code: error.code, details: error.details });
  }
}

export function toAppError(error: unknown): unknown {
  return error instanceof ExternalProviderError ? AppError.fromUpstream(error) : error;
}
