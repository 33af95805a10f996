/**
 * Google Sheets transport type definitions
 *
 * The connection talks to spreadsheets only through these interfaces.
 * PublicSheetsClient and ServiceAccountSheetsClient implement them; tests
 * substitute an in-memory implementation.
 */

import type {
  ConnectionMode,
  SpreadsheetReference,
  WorksheetReference,
} from "../connection";
import type { RawGrid, SheetCellInput } from "../table";

/**
 * Worksheet metadata as reported by the Sheets API
 */
export type WorksheetProperties = {
  title: string;
  /** sheetId, the "gid" in spreadsheet URLs */
  gid: number;
  /** Zero-based tab position */
  index: number;
  rowCount?: number;
  columnCount?: number;
};

export type GetValuesOptions = {
  /** false reads formulas instead of their results */
  evaluateFormulas?: boolean;
};

export interface WorksheetHandle {
  /** Stable key for this worksheet within its spreadsheet, used in cache keys */
  readonly key: string;
  /** Title when known (public exports may not report one) */
  readonly title?: string;
  getAllValues(options?: GetValuesOptions): Promise<RawGrid>;
  /** Overwrite an A1 range with values */
  update(range: string, values: SheetCellInput[][]): Promise<void>;
  appendRows(values: SheetCellInput[][]): Promise<void>;
  clear(): Promise<void>;
}

export interface SpreadsheetHandle {
  /** Spreadsheet key (the id segment of its URL) */
  readonly id: string;
  readonly title?: string;
  worksheet(ref: WorksheetReference): Promise<WorksheetHandle>;
  listWorksheets(): Promise<WorksheetProperties[]>;
  addWorksheet(
    title: string,
    rows: number,
    cols: number,
  ): Promise<WorksheetProperties>;
}

export interface SpreadsheetClient {
  readonly mode: ConnectionMode;
  openSpreadsheet(ref: SpreadsheetReference): Promise<SpreadsheetHandle>;
  /** New empty spreadsheet with this title (service account only) */
  createSpreadsheet(title: string): Promise<SpreadsheetHandle>;
  /** Confirms the credential with the remote service (no-op for public access) */
  verify(): Promise<void>;
}

/**
 * Service-account client construction options
 */
export type ServiceAccountClientConfig = {
  /** Drive folder that title lookups are restricted to */
  folderId?: string;
  /** Used in "share with ..." guidance on permission errors */
  clientEmail: string;
};

/**
 * Source of OAuth2 bearer tokens for authenticated calls
 */
export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}
