export type ErrorCode =
  | 'UNSUPPORTED_VENUE'
  | 'FUNDING_UNSUPPORTED'
  | 'SCHEMA_ERROR'
  | 'UNKNOWN_INTERVAL'
  | 'HTTP_ERROR'
  | 'TIMEOUT'
  | 'ABORTED'
  | 'NETWORK_ERROR';

export class FetcherError extends Error {
  readonly code: ErrorCode;
  readonly status?: number;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    opts: { status?: number; details?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'FetcherError';
    this.code = code;
    this.status = opts.status;
    this.details = opts.details;
  }
}

/** Unsupported venue, or an operation the bound venue has no concept of. */
export class ConfigError extends FetcherError {
  constructor(message: string, code: 'UNSUPPORTED_VENUE' | 'FUNDING_UNSUPPORTED', details?: Record<string, unknown>) {
    super(message, code, { details });
    this.name = 'ConfigError';
  }
}

/** A venue payload is missing a field or filter the parsers need. */
export class SchemaError extends FetcherError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'SCHEMA_ERROR', { details, cause });
    this.name = 'SchemaError';
  }
}

export class IntervalError extends FetcherError {
  constructor(interval: string) {
    super(`unknown interval: ${interval}`, 'UNKNOWN_INTERVAL', { details: { interval } });
    this.name = 'IntervalError';
  }
}

export class TransportError extends FetcherError {
  constructor(
    message: string,
    code: 'HTTP_ERROR' | 'TIMEOUT' | 'ABORTED' | 'NETWORK_ERROR',
    opts: { status?: number; details?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(message, code, opts);
    this.name = 'TransportError';
  }
}

/**
 * Only transport failures are worth another attempt. 4xx responses are the
 * caller's fault, except 429/418 which Binance uses for rate-limit back-off.
 */
export function isRetryable(err: unknown): boolean {
  if (!(err instanceof FetcherError)) return true;
  if (!(err instanceof TransportError)) return false;
  // cancelled by the caller
  if (err.code === 'ABORTED') return false;
  if (err.status === undefined) return true;
  if (err.status === 429 || err.status === 418) return true;
  return err.status >= 500;
}
