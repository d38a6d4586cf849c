/**
 * Error taxonomy shared by connectors, the pager and the batch driver.
 * Each class carries a `kind` so callers can switch on it without instanceof chains.
 */

export type ErrorKind =
  | 'parse_failure'
  | 'fetch_transient'
  | 'fetch_rate_limited'
  | 'fetch_auth_invalid'
  | 'fetch_failed'
  | 'storage_conflict'
  | 'config';

export abstract class TesseraError extends Error {
  abstract readonly kind: ErrorKind;
}

/** Malformed input for a parser. Recovered: the caller gets an empty or partial record. */
export class ParseFailure extends TesseraError {
  readonly kind = 'parse_failure';

  constructor(
    public sourceHint: string,
    message: string,
  ) {
    super(`${sourceHint}: ${message}`);
    this.name = 'ParseFailure';
  }
}

/** Timeout, dropped connection or 5xx. Retried with a fixed backoff. */
export class FetchTransientError extends TesseraError {
  readonly kind = 'fetch_transient';

  constructor(
    public serviceName: string,
    message: string,
    public statusCode?: number,
  ) {
    super(`${serviceName} request failed${statusCode ? ` (HTTP ${statusCode})` : ''}: ${message}`);
    this.name = 'FetchTransientError';
  }
}

export class FetchRateLimitedError extends TesseraError {
  readonly kind = 'fetch_rate_limited';

  constructor(
    public serviceName: string,
    public retryAfterMs?: number,
  ) {
    super(
      `${serviceName} rate limit exceeded${retryAfterMs ? `. Retry after ${Math.ceil(retryAfterMs / 1000)}s` : ''}`,
    );
    this.name = 'FetchRateLimitedError';
  }
}

/** Credentials rejected (401/403). Fatal to the whole run. */
export class FetchAuthInvalidError extends TesseraError {
  readonly kind = 'fetch_auth_invalid';

  constructor(
    public serviceName: string,
    public statusCode: number,
  ) {
    super(
      statusCode === 403
        ? `${serviceName} access forbidden (HTTP 403)`
        : `${serviceName} token invalid or expired (HTTP ${statusCode})`,
    );
    this.name = 'FetchAuthInvalidError';
  }
}

/** Any other non-success response. Not retried. */
export class FetchError extends TesseraError {
  readonly kind = 'fetch_failed';

  constructor(
    public serviceName: string,
    public statusCode: number,
    message: string,
  ) {
    super(`${serviceName} error (HTTP ${statusCode}): ${message}`);
    this.name = 'FetchError';
  }
}

export class StorageConflictError extends TesseraError {
  readonly kind = 'storage_conflict';

  constructor(message: string) {
    super(message);
    this.name = 'StorageConflictError';
  }
}

export class ConfigError extends TesseraError {
  readonly kind = 'config';

  constructor(
    public settingName: string,
    public problems: string[],
  ) {
    super(`${settingName} not configured. ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isRetryableError(err: unknown): boolean {
  return err instanceof FetchTransientError || err instanceof FetchRateLimitedError;
}

/** Errors that must stop a run rather than fail a single item. */
export function isFatalError(err: unknown): boolean {
  return err instanceof FetchAuthInvalidError || err instanceof ConfigError;
}
