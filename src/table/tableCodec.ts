/**
 * Table codec — worksheet grid <-> typed Table
 *
 * Decoding:
 * - Trailing empty rows dropped, width = last non-empty cell + 1
 * - After column selection, trailing rows that are all NA are dropped too
 * - Header row (or positional names), blank names -> "Unnamed: <i>"
 * - Column selection in sheet order, then row limit
 * - NA cells -> null; a column is numeric only if every non-NA cell is
 *
 * Encoding produces the rectangle [header, ...rows] for a range update, or
 * the bare rows for an append.
 */

import type {
  CellValue,
  ColumnType,
  DecodeOptions,
  RawCell,
  RawGrid,
  SheetCellInput,
  Table,
} from "@/types";
import {
  DEFAULT_NA_VALUES,
  NUMERIC_CELL_PATTERN,
  UNNAMED_COLUMN_PREFIX,
} from "@/constants";
import { ConfigError, DataError } from "@/errors";
import { colIndexToLetter, qualifyRange } from "@/utils";

/**
 * Cell text as Sheets displays it
 */
function cellText(cell: RawCell): string {
  if (cell === null || cell === undefined) {
    return "";
  }
  if (typeof cell === "boolean") {
    return cell ? "TRUE" : "FALSE";
  }
  return String(cell);
}

function parseNumericCell(cell: RawCell): number | null {
  if (typeof cell === "number") {
    return Number.isFinite(cell) ? cell : null;
  }
  const text = cellText(cell).trim();
  if (!NUMERIC_CELL_PATTERN.test(text)) {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

function gridWidth(grid: RawGrid): number {
  let width = 0;
  for (const row of grid) {
    for (let col = row.length - 1; col >= width; col--) {
      if (cellText(row[col]) !== "") {
        width = col + 1;
        break;
      }
    }
  }
  return width;
}

function dropTrailingEmptyRows(grid: RawGrid): RawGrid {
  let end = grid.length;
  while (end > 0 && grid[end - 1].every((cell) => cellText(cell) === "")) {
    end--;
  }
  return grid.slice(0, end);
}

function selectColumns(
  useCols: readonly number[] | undefined,
  width: number,
): number[] {
  const all = Array.from({ length: width }, (_, i) => i);
  if (useCols === undefined) {
    return all;
  }

  for (const index of useCols) {
    if (!Number.isInteger(index) || index < 0 || index >= width) {
      throw new DataError(
        `Column index ${index} is outside the worksheet (width ${width})`,
        { column: index, width },
      );
    }
  }

  // Sheet order, duplicates ignored
  const wanted = new Set(useCols);
  return all.filter((i) => wanted.has(i));
}

function assertUniqueColumns(columns: readonly string[]): void {
  const seen = new Set<string>();
  for (const name of columns) {
    if (seen.has(name)) {
      throw new DataError(`Duplicate column name "${name}"`, { column: name });
    }
    seen.add(name);
  }
}

function validateRowLimit(nRows: number | undefined): void {
  if (nRows !== undefined && (!Number.isInteger(nRows) || nRows < 0)) {
    throw new ConfigError(`nRows must be a non-negative integer, got ${nRows}`, {
      field: "nRows",
    });
  }
}

/**
 * Decode a raw worksheet grid into a Table
 *
 * @throws {DataError} On an out-of-range column index or duplicate names
 * @throws {ConfigError} On an invalid row limit
 */
export function decodeTable(grid: RawGrid, options: DecodeOptions = {}): Table {
  const header = options.header ?? true;
  const naValues = new Set([...DEFAULT_NA_VALUES, ...(options.naValues ?? [])]);
  validateRowLimit(options.nRows);

  const trimmed = dropTrailingEmptyRows(grid);
  const width = gridWidth(trimmed);
  const selected = selectColumns(options.useCols, width);

  const headerRow = header ? trimmed[0] ?? [] : undefined;
  const columns = selected.map((col) => {
    if (!headerRow) {
      return String(col);
    }
    const name = cellText(headerRow[col]);
    return name === "" ? `${UNNAMED_COLUMN_PREFIX}${col}` : name;
  });
  assertUniqueColumns(columns);

  const isNa = (cell: RawCell): boolean => naValues.has(cellText(cell));

  // Rows that are all NA in the retained columns end the data
  let end = trimmed.length;
  const start = header ? 1 : 0;
  while (end > start && selected.every((col) => isNa(trimmed[end - 1][col]))) {
    end--;
  }
  let body = trimmed.slice(start, end);
  if (options.nRows !== undefined) {
    body = body.slice(0, options.nRows);
  }

  const rawColumns: RawCell[][] = selected.map((col) =>
    body.map((row) => {
      const cell = row[col];
      return isNa(cell) ? null : cell;
    }),
  );

  const columnTypes: ColumnType[] = [];
  const decodedColumns: CellValue[][] = rawColumns.map((cells) => {
    const present = cells.filter((cell) => cell !== null);
    const numbers = present.map(parseNumericCell);
    const isNumeric =
      present.length > 0 && numbers.every((value) => value !== null);
    columnTypes.push(isNumeric ? "number" : "string");

    return cells.map((cell) => {
      if (cell === null) {
        return null;
      }
      return isNumeric ? parseNumericCell(cell) : cellText(cell);
    });
  });

  const rows: CellValue[][] = body.map((_, rowIndex) =>
    decodedColumns.map((cells) => cells[rowIndex]),
  );

  return { columns, columnTypes, rows };
}

/**
 * Check the Table invariants before a write
 *
 * @throws {DataError} On an empty or duplicated column set, a type list of
 * the wrong length, ragged rows or non-finite numbers
 */
export function validateTable(table: Table): void {
  if (table.columns.length === 0) {
    throw new DataError("Cannot write a table without columns");
  }
  assertUniqueColumns(table.columns);

  if (table.columnTypes.length !== table.columns.length) {
    throw new DataError(
      `Table has ${table.columns.length} columns but ${table.columnTypes.length} column types`,
    );
  }

  table.rows.forEach((row, rowIndex) => {
    if (row.length !== table.columns.length) {
      throw new DataError(
        `Row ${rowIndex} has ${row.length} cells, expected ${table.columns.length}`,
        { row: rowIndex },
      );
    }
    row.forEach((cell, colIndex) => {
      if (typeof cell === "number" && !Number.isFinite(cell)) {
        throw new DataError(
          `Row ${rowIndex} column "${table.columns[colIndex]}" holds a non-finite number`,
          { row: rowIndex, column: table.columns[colIndex] },
        );
      }
    });
  });
}

function encodeRow(row: readonly CellValue[]): SheetCellInput[] {
  return row.map((cell) => (cell === null ? "" : cell));
}

/**
 * Grid written by a full-range update: header row then data rows
 */
export function encodeForUpdate(table: Table): SheetCellInput[][] {
  validateTable(table);
  return [[...table.columns], ...table.rows.map(encodeRow)];
}

/**
 * Rows written by an append (no header)
 */
export function encodeForAppend(table: Table): SheetCellInput[][] {
  validateTable(table);
  return table.rows.map(encodeRow);
}

/**
 * A1 range spanned by encodeForUpdate(table): A1:<lastCol><rows + 1>
 * Qualified with the worksheet title when one is given
 */
export function buildUpdateRange(title: string | undefined, table: Table): string {
  validateTable(table);
  const lastCol = colIndexToLetter(table.columns.length - 1);
  const range = `A1:${lastCol}${table.rows.length + 1}`;
  return title === undefined ? range : qualifyRange(title, range);
}

/**
 * Rows as objects keyed by column name
 */
export function tableToRecords(table: Table): Record<string, CellValue>[] {
  return table.rows.map((row) =>
    Object.fromEntries(table.columns.map((name, i) => [name, row[i]])),
  );
}
