// src/util/errors.ts
// What: Typed application errors surfaced to the API and the UI.
// How: AppError carries an HTTP status and a stable code; the centralized error handler in app.ts
//      turns any AppError into { error: { message, code } } with that status.

export type ErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'PARSE_ERROR'
  | 'EMBEDDING_SERVICE_ERROR'
  | 'STORAGE_ERROR'
  | 'NOT_FOUND'
  | 'SEARCH_ERROR'
  | 'VALIDATION_ERROR';

export class AppError extends Error {
  readonly status: number;
  readonly code: ErrorCode;

  constructor(message: string, status: number, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.status = status;
    this.code = code;
  }
}

/** Upload is neither a PDF nor a plain-text file. */
export class UnsupportedFormatError extends AppError {
  constructor(message: string) {
    super(message, 415, 'UNSUPPORTED_FORMAT');
    this.name = 'UnsupportedFormatError';
  }
}

/** Upload has a supported type but its content cannot be read. */
export class ParseError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 422, 'PARSE_ERROR', options);
    this.name = 'ParseError';
  }
}

export class EmbeddingServiceError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 503, 'EMBEDDING_SERVICE_ERROR', options);
    this.name = 'EmbeddingServiceError';
  }
}

/** Database unreachable, constraint violation or a vector of the wrong dimension. */
export class StorageError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 503, 'STORAGE_ERROR', options);
    this.name = 'StorageError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/**
 * Failure while answering a query. Keeps the embedding or storage error as `cause`
 * and reuses its status so an unavailable backend still reads as 503.
 */
export class SearchError extends AppError {
  constructor(message: string, cause: unknown) {
    super(message, cause instanceof AppError ? cause.status : 500, 'SEARCH_ERROR', { cause });
    this.name = 'SearchError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : 'Unknown error';
}
