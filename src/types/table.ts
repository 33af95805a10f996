/**
 * Table type definitions
 *
 * A Table is the typed, rectangular form of a worksheet's cell grid.
 */

/**
 * Decoded cell value; null marks a missing (NA) cell
 */
export type CellValue = string | number | null;

export type ColumnType = "number" | "string";

export type Table = {
  /** Unique, case-sensitive column names */
  columns: string[];
  /** One entry per column */
  columnTypes: ColumnType[];
  /** Every row has exactly columns.length cells */
  rows: CellValue[][];
};

/**
 * Raw cell as returned by a transport (CSV text, Sheets API values)
 */
export type RawCell = string | number | boolean | null | undefined;

export type RawGrid = RawCell[][];

/**
 * Cell written back to a worksheet
 */
export type SheetCellInput = string | number;

export type DecodeOptions = {
  header?: boolean;
  useCols?: readonly number[];
  nRows?: number;
  naValues?: readonly string[];
};
