/**
 * HTTP client public API
 */

export { createHttpClient, httpRequest } from "./httpClient";
export { HttpError, describeErrorBody, parseRetryAfter } from "./httpError";
export type {
  HttpClientOptions,
  HttpRequest,
  HttpResponse,
  HttpRequestFn,
  HttpMethod,
  HttpErrorDetails,
} from "@/types";
