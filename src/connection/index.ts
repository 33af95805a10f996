/**
 * Connection public API
 */

export { GSheetsConnection } from "./gsheetsConnection";
export {
  parseConnectionConfig,
  resolveCredential,
  connectionModeOf,
} from "./credentialResolver";
export {
  resolveSpreadsheetReference,
  resolveWorksheetReference,
  canonicalSpreadsheetKey,
  canonicalWorksheetKey,
} from "./referenceResolver";
export { ClientFactory } from "./clientFactory";
export type { CreateClientFn, ClientFactoryOptions } from "./clientFactory";
export { HandleCache } from "./handleCache";
