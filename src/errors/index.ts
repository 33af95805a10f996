/**
 * Error taxonomy public API
 */

export {
  SheetsConnectionError,
  ConfigError,
  AuthError,
  ModeError,
  NotFoundError,
  DataError,
  ConflictError,
  TransportError,
  isSheetsConnectionError,
} from "./connectionErrors";
export type { SheetsErrorKind, SheetsErrorDetails } from "./connectionErrors";
export {
  translateTransportError,
  extractStatus,
  extractMessage,
} from "./translateTransportError";
export type { TransportErrorContext } from "./translateTransportError";
