export type ErrorCode =
  | 'FETCH_FAILED'
  | 'TIMEOUT'
  | 'HTTP_ERROR'
  | 'PARSE_ERROR'
  | 'VALIDATION_ERROR'
  | 'PERSISTENCE_ERROR'
  | 'EXTERNAL_SERVICE_ERROR'
  | 'ACCESS_CODE_EXHAUSTED'
  | 'UNAUTHORIZED';

export class SignalScoreError extends Error {
  readonly code: ErrorCode;
  readonly details?: string;

  constructor(code: ErrorCode, message: string, details?: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class FetchError extends SignalScoreError {
  readonly url: string;
  readonly status?: number;

  constructor(code: 'FETCH_FAILED' | 'TIMEOUT' | 'HTTP_ERROR', url: string, message: string, status?: number, details?: string) {
    super(code, message, details);
    this.url = url;
    this.status = status;
  }

  static fromUnknown(error: unknown, url: string, timeoutMs: number): FetchError {
    if (error instanceof FetchError) return error;
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      return new FetchError('TIMEOUT', url, `Request to ${url} timed out after ${timeoutMs}ms`, undefined, error.message);
    }
    return new FetchError('FETCH_FAILED', url, `Failed to fetch ${url}`, undefined, getErrorMessage(error));
  }

  static httpStatus(url: string, status: number): FetchError {
    return new FetchError('HTTP_ERROR', url, `Failed to fetch ${url}: HTTP ${status}`, status);
  }
}

export class ParseError extends SignalScoreError {
  constructor(message: string, details?: string) {
    super('PARSE_ERROR', message, details);
  }
}

export class ValidationError extends SignalScoreError {
  constructor(message: string, details?: string) {
    super('VALIDATION_ERROR', message, details);
  }
}

export class PersistenceError extends SignalScoreError {
  constructor(operation: string, cause: unknown) {
    super('PERSISTENCE_ERROR', `Storage operation failed: ${operation}`, getErrorMessage(cause));
  }
}

export class ExternalServiceError extends SignalScoreError {
  readonly service: 'stripe' | 'email' | 'sheets';

  constructor(service: 'stripe' | 'email' | 'sheets', message: string, cause?: unknown) {
    super('EXTERNAL_SERVICE_ERROR', message, cause === undefined ? undefined : getErrorMessage(cause));
    this.service = service;
  }
}

export class AccessCodeExhaustedError extends SignalScoreError {
  constructor(attempts: number) {
    super('ACCESS_CODE_EXHAUSTED', `Could not generate a unique access code after ${attempts} attempts`);
  }
}

export class UnauthorizedError extends SignalScoreError {
  constructor(message = 'A valid Pro access code is required') {
    super('UNAUTHORIZED', message);
  }
}

export function isSignalScoreError(error: unknown): error is SignalScoreError {
  return error instanceof SignalScoreError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  FETCH_FAILED: 502,
  TIMEOUT: 504,
  HTTP_ERROR: 502,
  PARSE_ERROR: 422,
  VALIDATION_ERROR: 400,
  PERSISTENCE_ERROR: 503,
  EXTERNAL_SERVICE_ERROR: 502,
  ACCESS_CODE_EXHAUSTED: 503,
  UNAUTHORIZED: 401,
};

export function toErrorResponse(error: unknown): { status: number; body: { error: string; code: ErrorCode | 'UNKNOWN' } } {
  if (isSignalScoreError(error)) {
    return { status: STATUS_BY_CODE[error.code], body: { error: error.message, code: error.code } };
  }
  return { status: 500, body: { error: 'Unexpected server error', code: 'UNKNOWN' } };
}
