/**
 * Connection error taxonomy
 *
 * Every failure leaving the connection is one of these classes, so hosts can
 * branch on `kind` (or instanceof) regardless of which transport failed.
 */

export type SheetsErrorKind =
  | "config"
  | "auth"
  | "mode"
  | "not_found"
  | "data"
  | "conflict"
  | "transport";

/**
 * Context attached to an error for diagnostics
 * Never carries credential material
 */
export type SheetsErrorDetails = {
  status?: number;
  spreadsheet?: string;
  worksheet?: string;
  operation?: string;
  field?: string;
  [key: string]: unknown;
};

export class SheetsConnectionError extends Error {
  public readonly kind: SheetsErrorKind;
  public readonly details: SheetsErrorDetails;

  constructor(
    kind: SheetsErrorKind,
    message: string,
    details: SheetsErrorDetails = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SheetsConnectionError";
    this.kind = kind;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Malformed or contradictory configuration; not retryable
 */
export class ConfigError extends SheetsConnectionError {
  constructor(message: string, details?: SheetsErrorDetails) {
    super("config", message, details);
    this.name = "ConfigError";
  }
}

/**
 * Credential rejected by Google (bad key, disabled API, clock skew)
 */
export class AuthError extends SheetsConnectionError {
  constructor(
    message: string,
    details?: SheetsErrorDetails,
    options?: { cause?: unknown },
  ) {
    super("auth", message, details, options);
    this.name = "AuthError";
  }
}

/**
 * Operation not permitted in the connection's mode
 */
export class ModeError extends SheetsConnectionError {
  constructor(operation: string) {
    super(
      "mode",
      `${operation}() is not available on a public read-only connection. ` +
        "Configure service account credentials to enable writes.",
      { operation },
    );
    this.name = "ModeError";
  }
}

/**
 * Spreadsheet or worksheet missing, or not shared with the caller
 */
export class NotFoundError extends SheetsConnectionError {
  constructor(
    message: string,
    details?: SheetsErrorDetails,
    options?: { cause?: unknown },
  ) {
    super("not_found", message, details, options);
    this.name = "NotFoundError";
  }
}

/**
 * Grid/table inconsistency (ragged rows, duplicate columns, bad column index)
 */
export class DataError extends SheetsConnectionError {
  constructor(message: string, details?: SheetsErrorDetails) {
    super("data", message, details);
    this.name = "DataError";
  }
}

/**
 * Worksheet title already taken
 */
export class ConflictError extends SheetsConnectionError {
  constructor(
    message: string,
    details?: SheetsErrorDetails,
    options?: { cause?: unknown },
  ) {
    super("conflict", message, details, options);
    this.name = "ConflictError";
  }
}

/**
 * Remote failure that fits no other kind (5xx, network, timeouts)
 */
export class TransportError extends SheetsConnectionError {
  constructor(
    message: string,
    details?: SheetsErrorDetails,
    options?: { cause?: unknown },
  ) {
    super("transport", message, details, options);
    this.name = "TransportError";
  }
}

export function isSheetsConnectionError(
  error: unknown,
): error is SheetsConnectionError {
  return error instanceof SheetsConnectionError;
}
