/**
 * Transport error translation
 *
 * Maps raw failures from the HTTP client (HttpError, whose message carries
 * Google's JSON error body), the JWT signer and the network layer onto the
 * connection error taxonomy.
 * Errors already in the taxonomy pass through unchanged.
 */

import {
  AuthError,
  ConflictError,
  NotFoundError,
  TransportError,
  isSheetsConnectionError,
} from "./connectionErrors";
import type { SheetsConnectionError } from "./connectionErrors";
import type { SheetsErrorDetails } from "./connectionErrors";
import {
  HTTP_STATUS_BAD_REQUEST,
  HTTP_STATUS_CONFLICT,
  HTTP_STATUS_FORBIDDEN,
  HTTP_STATUS_NOT_FOUND,
  HTTP_STATUS_UNAUTHORIZED,
} from "@/constants";

export type TransportErrorContext = {
  operation: string;
  spreadsheet?: string;
  worksheet?: string;
  /** Service-account email for sharing guidance; absent in public mode */
  clientEmail?: string;
};

/**
 * OAuth/credential failures reported by Google's token endpoint or APIs,
 * and private keys the JWT signer cannot decode
 */
const AUTH_FAILURE_PATTERN =
  /invalid_grant|invalid_client|unauthorized_client|invalid jwt|account not found|no key or keyfile|DECODER routines|secretOrPrivateKey/i;

/**
 * API not enabled for the service account's project
 */
const API_DISABLED_PATTERN =
  /has not been used in project|is disabled|SERVICE_DISABLED|accessNotConfigured/i;

const ALREADY_EXISTS_PATTERN = /already exists/i;

const UNKNOWN_RANGE_PATTERN = /unable to parse range/i;

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) {
    return undefined;
  }
  const property: unknown = Reflect.get(value, key);
  return property;
}

function toStatus(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === "string" && /^\d{3}$/.test(value)) {
    return Number(value);
  }
  return undefined;
}

/**
 * HTTP status of a failed call
 * HttpError.status, a nested response.status, or a numeric `code`
 */
export function extractStatus(error: unknown): number | undefined {
  return (
    toStatus(readProperty(error, "status")) ??
    toStatus(readProperty(readProperty(error, "response"), "status")) ??
    toStatus(readProperty(error, "code"))
  );
}

export function extractMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function sharingGuidance(context: TransportErrorContext): string {
  if (context.clientEmail) {
    return `Make sure it exists and is shared with ${context.clientEmail}.`;
  }
  return 'Make sure it exists and is shared as "Anyone with the link can view".';
}

function describeTarget(context: TransportErrorContext): string {
  if (context.worksheet && context.spreadsheet) {
    return `worksheet ${context.worksheet} of spreadsheet ${context.spreadsheet}`;
  }
  if (context.spreadsheet) {
    return `spreadsheet ${context.spreadsheet}`;
  }
  return "the requested spreadsheet";
}

/**
 * Translate any failure from a transport call into the error taxonomy
 */
export function translateTransportError(
  error: unknown,
  context: TransportErrorContext,
): SheetsConnectionError {
  if (isSheetsConnectionError(error)) {
    return error;
  }

  const status = extractStatus(error);
  const message = extractMessage(error);
  const details: SheetsErrorDetails = {
    status,
    operation: context.operation,
    spreadsheet: context.spreadsheet,
    worksheet: context.worksheet,
  };
  const cause = { cause: error };

  if (status === HTTP_STATUS_UNAUTHORIZED || AUTH_FAILURE_PATTERN.test(message)) {
    return new AuthError(
      `Google rejected the service account credential during ${context.operation}: ${message}`,
      details,
      cause,
    );
  }

  if (status === HTTP_STATUS_FORBIDDEN) {
    if (API_DISABLED_PATTERN.test(message)) {
      return new AuthError(
        `The Google Sheets or Drive API is not enabled for this service account's project: ${message}`,
        details,
        cause,
      );
    }
    return new NotFoundError(
      `Access denied to ${describeTarget(context)}. ${sharingGuidance(context)}`,
      details,
      cause,
    );
  }

  if (status === HTTP_STATUS_NOT_FOUND) {
    return new NotFoundError(
      `Could not find ${describeTarget(context)}. ${sharingGuidance(context)}`,
      details,
      cause,
    );
  }

  if (
    status === HTTP_STATUS_CONFLICT ||
    (status === HTTP_STATUS_BAD_REQUEST && ALREADY_EXISTS_PATTERN.test(message))
  ) {
    return new ConflictError(
      `Conflict during ${context.operation} on ${describeTarget(context)}: ${message}`,
      details,
      cause,
    );
  }

  if (status === HTTP_STATUS_BAD_REQUEST && UNKNOWN_RANGE_PATTERN.test(message)) {
    return new NotFoundError(
      `Could not find ${describeTarget(context)}: ${message}`,
      details,
      cause,
    );
  }

  return new TransportError(
    `Google Sheets request failed during ${context.operation}: ${message}`,
    details,
    cause,
  );
}
