/**
 * HttpError — non-2xx answer from a Google endpoint
 *
 * Sheets and Drive answer with `{ error: { message, status } }`, the OAuth2
 * token endpoint with `{ error, error_description }`. The readable part
 * goes into the message, where error translation matches on it; any other
 * body is kept as a truncated snippet.
 */

import type { HttpErrorDetails } from "@/types";
import {
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  RETRY_AFTER_STATUS_CODES,
} from "@/constants";
import { isJsonObject } from "@/utils";

function googleErrorText(parsed: unknown): string | undefined {
  if (!isJsonObject(parsed)) {
    return undefined;
  }
  const error = parsed.error;
  if (isJsonObject(error) && typeof error.message === "string") {
    return typeof error.status === "string"
      ? `${error.status}: ${error.message}`
      : error.message;
  }
  if (typeof error === "string") {
    const description = parsed.error_description;
    return typeof description === "string" ? `${error}: ${description}` : error;
  }
  return undefined;
}

/**
 * Google's error text, or the start of the body when it is not an API error
 */
export function describeErrorBody(body: string | undefined): string | undefined {
  if (!body) {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    parsed = undefined;
  }
  const text = googleErrorText(parsed);
  if (text) {
    return text;
  }
  return body.length > ERROR_BODY_SNIPPET_MAX_LENGTH
    ? `${body.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH)}...`
    : body;
}

/**
 * Retry-After as delay-seconds or an HTTP date, in ms from now
 */
export function parseRetryAfter(value: string | null | undefined, now = Date.now()): number | null {
  if (!value) {
    return null;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return seconds > 0 ? seconds * 1000 : null;
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return null;
  }
  return date > now ? date - now : null;
}

export class HttpError extends Error {
  public readonly status: number;
  public readonly url: string;
  public readonly detail?: string;
  /** Wait the server asked for on 429 and 503 */
  public readonly retryAfterMs: number | null;

  constructor(details: HttpErrorDetails) {
    const detail = describeErrorBody(details.body);
    super(`HTTP ${details.status} - ${details.url}${detail ? ` - ${detail}` : ""}`);
    this.name = "HttpError";
    this.status = details.status;
    this.url = details.url;
    this.detail = detail;
    this.retryAfterMs = RETRY_AFTER_STATUS_CODES.includes(details.status)
      ? parseRetryAfter(details.retryAfter)
      : null;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError);
    }
  }
}
