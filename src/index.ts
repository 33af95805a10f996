/**
 * sheets-connection — Google Sheets as a tabular data source
 */

export * from "./connection";
export * from "./errors";
export * from "./table";
export * from "./config";
export { runSqlQuery } from "./query";
export type { WorksheetLoader } from "./query";
export {
  PublicSheetsClient,
  ServiceAccountSheetsClient,
  ServiceAccountTokenProvider,
} from "./clients/googleSheets";
export { setLogLevel } from "./logger";
export type {
  CellValue,
  ColumnType,
  Table,
  RawCell,
  RawGrid,
  DecodeOptions,
  ConnectionConfig,
  ConnectionMode,
  ConnectionOptions,
  Credential,
  ServiceAccountCredential,
  SpreadsheetReference,
  WorksheetReference,
  WorksheetInput,
  TargetOptions,
  ReadOptions,
  CreateOptions,
  QueryOptions,
  SpreadsheetClient,
  SpreadsheetHandle,
  WorksheetHandle,
  WorksheetProperties,
  AccessTokenProvider,
  LogLevel,
} from "./types";
