/**
 * Google Sheets client public API
 */

export { PublicSheetsClient } from "./publicSheetsClient";
export { ServiceAccountSheetsClient } from "./serviceAccountSheetsClient";
export { ServiceAccountTokenProvider } from "./serviceAccountTokenProvider";
export type {
  SpreadsheetClient,
  SpreadsheetHandle,
  WorksheetHandle,
  WorksheetProperties,
  GetValuesOptions,
  AccessTokenProvider,
  ServiceAccountClientConfig,
} from "@/types";
