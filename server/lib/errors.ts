/**
 * Error types and classification predicates shared by the provider boundary
 * and the sync loop.
 *
 * Kept in lib/ so the engine can depend on them without importing any
 * concrete provider adapter.
 */

/**
 * Closed set of outcomes a DataProvider may signal instead of rows.
 *
 * - transient: unknown or retryable failure
 * - throttled: provider-side rate limit; caller cools down before retrying
 * - invalid-instrument: permanent for this instrument
 * - not-found: confirmed "no data in range", persisted as an empty chunk
 */
type ProviderErrorKind = 'transient' | 'throttled' | 'invalid-instrument' | 'not-found';

class ProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly httpStatus?: number;

  constructor(kind: ProviderErrorKind, message: string, options: { cause?: unknown; httpStatus?: number } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ProviderError';
    this.kind = kind;
    this.httpStatus = options.httpStatus;
  }
}

function isProviderError(err: unknown): err is ProviderError {
  return err instanceof ProviderError;
}

/**
 * Returns true if `err` represents a request-abort signal: an AbortError by
 * name, an HTTP 499 status, or an error message containing "aborted" /
 * "aborterror" (case-insensitive).
 */
function isAbortError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  const name = 'name' in err ? String(err.name || '') : '';
  const message = 'message' in err ? String(err.message || '') : '';
  const httpStatus = 'httpStatus' in err ? Number(err.httpStatus) : 0;
  return name === 'AbortError' || httpStatus === 499 || /aborted|aborterror/i.test(message);
}

function buildRequestAbortError(message?: string): Error {
  const err = new Error(message || 'Request aborted');
  err.name = 'AbortError';
  return err;
}

/** Anything not already classified at the provider boundary counts as transient. */
function classifyProviderError(err: unknown): ProviderError {
  if (isProviderError(err)) return err;
  return new ProviderError('transient', errorMessage(err), { cause: err });
}

function isEnoent(error: unknown): error is NodeJS.ErrnoException {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export { ProviderError, isAbortError, buildRequestAbortError, classifyProviderError, errorMessage, isEnoent };
export type { ProviderErrorKind };
