export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;
  }
}

export function notFound(message = 'not found'): HttpError {
  return new HttpError(404, message);
}

export function badRequest(message: string, details?: unknown): HttpError {
  return new HttpError(400, message, details);
}

export function unauthorized(message = 'unauthorized'): HttpError {
  return new HttpError(401, message);
}

export function forbidden(message = 'forbidden'): HttpError {
  return new HttpError(403, message);
}

export type PipelineErrorKind = 'fetch' | 'parse' | 'load' | 'transform';

type PipelineErrorOptions = {
  cause?: unknown;
  details?: unknown;
};

/**
 * Base class of the errors that abort a pipeline run at the step raising them.
 */
export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly details?: unknown;

  constructor(kind: PipelineErrorKind, message: string, options: PipelineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PipelineError';
    this.kind = kind;
    this.details = options.details;
  }
}

/** Network, credential or unknown-dataset failure while downloading. */
export class FetchError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super('fetch', message, options);
    this.name = 'FetchError';
  }
}

/** Malformed source file or header mismatch. */
export class ParseError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super('parse', message, options);
    this.name = 'ParseError';
  }
}

/** Database connectivity or constraint failure while writing. */
export class LoadError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super('load', message, options);
    this.name = 'LoadError';
  }
}

/** Empty or unreadable staging table. */
export class TransformError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super('transform', message, options);
    this.name = 'TransformError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
