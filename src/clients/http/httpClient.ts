/**
 * HTTP transport for the Sheets clients, on native fetch
 *
 * Each attempt has a timeout. GETs are retried on network failures,
 * timeouts, 408, 429 and 5xx, waiting for Retry-After when Google sends one
 * and backing off exponentially otherwise. Writes are sent once: a repeated
 * append would add its rows twice.
 */

import type { HttpClientOptions, HttpRequest, HttpRequestFn, HttpResponse } from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRY_AFTER_MS,
  DEFAULT_TEXT_HEADERS,
  RETRYABLE_STATUS_CODES,
} from "@/constants";
import * as logger from "@/logger";

type RetrySettings = Required<Omit<HttpClientOptions, "sleep">>;

function buildUrl(baseUrl: string, query?: HttpRequest["query"]): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }
  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(query)) {
    url.searchParams.append(key, String(value));
  }
  return url.toString();
}

function isRetryable(error: unknown, req: HttpRequest): boolean {
  if (req.method !== "GET") {
    return false;
  }
  if (error instanceof HttpError) {
    return RETRYABLE_STATUS_CODES.includes(error.status);
  }
  // AbortError is our timeout, TypeError a fetch network failure
  return error instanceof Error && (error.name === "AbortError" || error.name === "TypeError");
}

/**
 * Retry-After when present, else min(maxDelay, base * 2^(attempt-1)) with jitter
 */
function retryDelayMs(error: unknown, attempt: number, settings: RetrySettings): number {
  if (error instanceof HttpError && error.retryAfterMs !== null) {
    return Math.min(error.retryAfterMs, settings.maxRetryAfterMs);
  }
  const backoff = Math.min(settings.baseDelayMs * 2 ** (attempt - 1), settings.maxDelayMs);
  return Math.floor(backoff * (0.5 + Math.random() * 0.5));
}

async function readErrorBody(response: Response): Promise<string | undefined> {
  try {
    return await response.text();
  } catch (error) {
    logger.debug("Could not read error response body", { url: response.url, error });
    return undefined;
  }
}

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function send(req: HttpRequest, url: string, timeoutMs: number): Promise<HttpResponse> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      method: req.method,
      headers: { ...DEFAULT_TEXT_HEADERS, ...req.headers },
      body: req.body,
      signal: controller.signal,
      redirect: "follow",
    });

    if (!response.ok) {
      throw new HttpError({
        status: response.status,
        url,
        body: await readErrorBody(response),
        retryAfter: response.headers.get("retry-after"),
      });
    }

    return {
      status: response.status,
      url: response.url || url,
      contentType: response.headers.get("content-type"),
      body: await response.text(),
    };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Request function with its own timeout and retry settings
 */
export function createHttpClient(options: HttpClientOptions = {}): HttpRequestFn {
  const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const settings: RetrySettings = {
    timeoutMs,
    maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS,
    maxRetryAfterMs: options.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS,
  };
  const sleep = options.sleep ?? wait;

  return async (req) => {
    const url = buildUrl(req.url, req.query);

    for (let attempt = 1; ; attempt++) {
      try {
        return await send(req, url, timeoutMs);
      } catch (error) {
        if (attempt >= settings.maxAttempts || !isRetryable(error, req)) {
          throw error;
        }
        const delayMs = retryDelayMs(error, attempt, settings);
        logger.debug("Retrying Google request", {
          url: req.url,
          attempt,
          delayMs,
          reason: error instanceof HttpError ? `status ${error.status}` : String(error),
        });
        await sleep(delayMs);
      }
    }
  };
}

/**
 * Default transport
 *
 * @throws {HttpError} On a non-2xx status once retries are spent
 * @throws {Error} On a network failure or timeout once retries are spent
 */
export const httpRequest: HttpRequestFn = createHttpClient();
