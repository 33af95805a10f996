/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "POST" | "PUT";

/**
 * Timeout and retry settings of one HTTP client; defaults from constants
 */
export interface HttpClientOptions {
  timeoutMs?: number;
  /** Attempts per GET, the first one included */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Cap on a Retry-After wait */
  maxRetryAfterMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  /** Serialized request body (JSON or form-encoded) */
  body?: string;
}

/**
 * Successful (2xx) response, body read as text
 */
export interface HttpResponse {
  status: number;
  url: string;
  contentType: string | null;
  body: string;
}

/**
 * Request function signature; injectable so callers can be tested offline
 */
export type HttpRequestFn = (req: HttpRequest) => Promise<HttpResponse>;

export interface HttpErrorDetails {
  status: number;
  url: string;
  /** Raw response body */
  body?: string;
  /** Retry-After header value */
  retryAfter?: string | null;
}
