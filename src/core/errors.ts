/**
 * Error types
 *
 * Configuration errors fail fast at client construction. Context errors are
 * thrown synchronously when implicit parent resolution finds nothing.
 * Delivery errors only surface from explicit flush() / close().
 */

export type ConfigErrorCode =
  | 'MISSING_PUBLIC_KEY'
  | 'MISSING_SECRET_KEY'
  | 'MISSING_CREDENTIALS'
  | 'INVALID_CONFIG';

export class TraceBatchError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TraceBatchError';
    this.code = code;
  }
}

// ─────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────

export class ConfigError extends TraceBatchError {
  declare readonly code: ConfigErrorCode;

  constructor(code: ConfigErrorCode, message: string) {
    super(code, message);
    this.name = 'ConfigError';
  }
}

// ─────────────────────────────────────────────────────────────
// Context
// ─────────────────────────────────────────────────────────────

export class NoActiveTraceError extends TraceBatchError {
  constructor() {
    super('NO_ACTIVE_TRACE', 'No active trace in context');
    this.name = 'NoActiveTraceError';
  }
}

export class NoActiveSpanError extends TraceBatchError {
  constructor() {
    super('NO_ACTIVE_SPAN', 'No active span in context');
    this.name = 'NoActiveSpanError';
  }
}

export class NoActiveGenerationError extends TraceBatchError {
  constructor() {
    super('NO_ACTIVE_GENERATION', 'No active generation in context');
    this.name = 'NoActiveGenerationError';
  }
}

// ─────────────────────────────────────────────────────────────
// Delivery
// ─────────────────────────────────────────────────────────────

/** Non-2xx response from the API. `body` is the raw response text. */
export class ApiError extends TraceBatchError {
  readonly statusCode: number;
  readonly body: string;

  constructor(statusCode: number, body: string) {
    super('API_ERROR', `API error (status ${statusCode}): ${body}`);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.body = body;
  }
}

export class RequestTimeoutError extends TraceBatchError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('REQUEST_TIMEOUT', `Request timeout after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** Network failure, caller abort, or an unexpected transport failure */
export class TransportError extends TraceBatchError {
  constructor(message: string, cause?: unknown) {
    super('TRANSPORT_ERROR', message, { cause });
    this.name = 'TransportError';
  }
}

export class SerializationError extends TraceBatchError {
  constructor(cause: unknown) {
    super('SERIALIZATION_ERROR', `Failed to serialize batch: ${describe(cause)}`, { cause });
    this.name = 'SerializationError';
  }
}

export type IngestionError = ApiError | RequestTimeoutError | TransportError | SerializationError;

/**
 * Normalize anything a transport rejected with into an IngestionError
 */
export function toIngestionError(err: unknown): IngestionError {
  if (
    err instanceof ApiError ||
    err instanceof RequestTimeoutError ||
    err instanceof TransportError ||
    err instanceof SerializationError
  ) {
    return err;
  }
  return new TransportError(describe(err), err);
}

// ─────────────────────────────────────────────────────────────
// Predicates
// ─────────────────────────────────────────────────────────────

export function isNotFound(err: unknown): boolean {
  return err instanceof ApiError && err.statusCode === 404;
}

export function isUnauthorized(err: unknown): boolean {
  return err instanceof ApiError && err.statusCode === 401;
}

export function isRateLimited(err: unknown): boolean {
  return err instanceof ApiError && err.statusCode === 429;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
