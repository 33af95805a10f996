/**
 * HTTP client constants — defaults and configuration
 */

/**
 * Default request timeout in milliseconds (30 seconds)
 */
export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

/**
 * Default headers; CSV for the public export, JSON callers override Accept
 */
export const DEFAULT_TEXT_HEADERS: Record<string, string> = {
  Accept: "text/csv, text/plain;q=0.9, */*;q=0.1",
};

/**
 * Maximum length of error body snippet to include in error messages
 * Long enough to keep the message of a Google API JSON error
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 500;

/**
 * Attempts per GET, the first one included
 */
export const DEFAULT_MAX_ATTEMPTS = 3;

/**
 * First backoff step; doubles per attempt, then jittered down by up to half
 */
export const DEFAULT_BASE_DELAY_MS = 1_000;

/**
 * Ceiling on one backoff step
 */
export const DEFAULT_MAX_DELAY_MS = 30_000;

/**
 * Upper bound on a server-provided Retry-After delay
 */
export const DEFAULT_MAX_RETRY_AFTER_MS = 60_000;

/**
 * Statuses whose Retry-After header is honoured
 */
export const RETRY_AFTER_STATUS_CODES: readonly number[] = [429, 503];

/**
 * Statuses a GET is retried on: timeout, quota (Sheets returns 429 per
 * minute per user) and transient server errors
 */
export const RETRYABLE_STATUS_CODES: readonly number[] = [408, 429, 500, 502, 503, 504];
