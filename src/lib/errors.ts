export type PipelineErrorCode =
  | 'PROVIDER_ERROR'
  | 'MALFORMED_RESPONSE'
  | 'VALIDATION_ERROR'
  | 'CACHE_READ_ERROR'
  | 'CACHE_WRITE_ERROR';

/**
 * Base class for every failure the pipeline knows how to classify.
 * `stage` is filled in by the orchestrator when the error escapes a stage.
 */
export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;
  public stage?: string;

  constructor(message: string, code: PipelineErrorCode, options?: { cause?: unknown; stage?: string }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PipelineError';
    this.code = code;
    this.stage = options?.stage;
  }
}

/** Transport or auth failure talking to the completion service. */
export class ProviderError extends PipelineError {
  public readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, 'PROVIDER_ERROR', { cause: options?.cause });
    this.name = 'ProviderError';
    this.status = options?.status;
  }
}

/** Provider output that could not be turned into strict JSON. */
export class MalformedResponseError extends PipelineError {
  public readonly raw: string;
  public readonly line: number;
  public readonly column: number;
  public readonly context: string;

  constructor(
    message: string,
    details: { raw: string; line: number; column: number; context: string },
  ) {
    super(`${message} (line ${details.line}, column ${details.column})`, 'MALFORMED_RESPONSE');
    this.name = 'MalformedResponseError';
    this.raw = details.raw;
    this.line = details.line;
    this.column = details.column;
    this.context = details.context;
  }
}

/** Parsed document does not have the shape a stage (or the config) requires. */
export class ValidationError extends PipelineError {
  public readonly details: string[];

  constructor(message: string, details?: string[] | string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    if (Array.isArray(details)) {
      this.details = details;
    } else if (details) {
      this.details = [details];
    } else {
      this.details = [];
    }
  }
}

export class CacheReadError extends PipelineError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to read cache entry ${path}`, 'CACHE_READ_ERROR', { cause });
    this.name = 'CacheReadError';
    this.path = path;
  }
}

export class CacheWriteError extends PipelineError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to write cache entry ${path}`, 'CACHE_WRITE_ERROR', { cause });
    this.name = 'CacheWriteError';
    this.path = path;
  }
}

export interface ErrorResponse {
  status: 400 | 404 | 422 | 500 | 502;
  body: { error: string; code: string; stage?: string; details?: string[] };
}

/**
 * Maps any thrown value onto an HTTP status and a JSON body.
 */
export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof ProviderError) {
    return { status: 502, body: { error: err.message, code: err.code, stage: err.stage } };
  }
  if (err instanceof ValidationError) {
    return { status: 422, body: { error: err.message, code: err.code, stage: err.stage, details: err.details } };
  }
  if (err instanceof PipelineError) {
    return { status: 422, body: { error: err.message, code: err.code, stage: err.stage } };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { status: 500, body: { error: message, code: 'INTERNAL_ERROR' } };
}
