import { AppError, type ErrorDetails } from './AppError.js';

const PREVIEW_LENGTH = 300;

/**
 * Rejected upload: wrong extension or MIME type, too large, or not a PDF by content.
 */
export class ValidationError extends AppError {
  constructor(message: string, options: { statusCode?: number; details?: ErrorDetails } = {}) {
    super(message, { statusCode: options.statusCode ?? 400, code: 'VALIDATION_ERROR', details: options.details });
  }
}

/**
 * No JSON object could be recovered from a model response.
 */
export class MalformedExtractionError extends AppError {
  readonly content: string;

  constructor(content: string, cause?: unknown) {
    const preview = content.length > PREVIEW_LENGTH ? `${content.slice(0, PREVIEW_LENGTH)}…` : content;
    super(`Unable to recover a JSON object from model response: ${preview}`, {
      statusCode: 422,
      code: 'MALFORMED_EXTRACTION',
      details: { length: content.length },
      cause,
    });
    this.content = content;
  }
}

/**
 * Recovered JSON that is missing a required field or carries a value of the wrong shape.
 */
export class SchemaViolationError extends AppError {
  readonly field: string;

  constructor(field: string, problem = 'is required') {
    super(`Statement field "${field}" ${problem}`, {
      statusCode: 422,
      code: 'SCHEMA_VIOLATION',
      details: { field },
    });
    this.field = field;
  }
}

export type ProviderUnavailableReason = 'NOT_CONFIGURED' | 'TRANSPORT';

/**
 * A model backend that cannot serve the call. NOT_CONFIGURED is permanent for the life of the
 * process; TRANSPORT failures carry `retryable` for callers that want to retry or fall back.
 */
export class ProviderUnavailableError extends AppError {
  readonly provider: string;
  readonly reason: ProviderUnavailableReason;
  readonly retryable: boolean;
  readonly status?: number;

  constructor(
    provider: string,
    reason: ProviderUnavailableReason,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(`Provider ${provider} unavailable: ${message}`, {
      statusCode: 503,
      code: reason === 'NOT_CONFIGURED' ? 'PROVIDER_NOT_CONFIGURED' : 'PROVIDER_TRANSPORT_ERROR',
      details: { provider, reason, status: options.status },
      cause: options.cause,
    });
    this.provider = provider;
    this.reason = reason;
    this.status = options.status;
    this.retryable = reason === 'TRANSPORT' && isRetryableStatus(options.status);
  }
}

const isRetryableStatus = (status: number | undefined): boolean => {
  if (status === undefined) {
    return true;
  }

  return status === 408 || status === 429 || status >= 500;
};
