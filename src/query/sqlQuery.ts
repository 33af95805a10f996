/**
 * SQL over worksheets
 *
 * Each query runs in its own in-memory SQLite database. Tables are loaded
 * lazily: the statement is prepared, every "no such table" names a worksheet
 * to load through the caller's loader, and preparation is retried until the
 * statement compiles.
 */

import Database from "better-sqlite3";

import type { CellValue, ColumnType, Table } from "@/types";
import { MAX_QUERY_WORKSHEETS, MISSING_TABLE_PATTERN } from "@/constants";
import { ConfigError, DataError } from "@/errors";
import * as logger from "@/logger";

/**
 * Loads the worksheet a table name refers to
 */
export type WorksheetLoader = (name: string) => Promise<Table>;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function missingTableName(error: unknown): string | undefined {
  const match = MISSING_TABLE_PATTERN.exec(errorMessage(error));
  return match ? match[1] : undefined;
}

function loadTable(db: Database.Database, name: string, table: Table): void {
  if (table.columns.length === 0) {
    throw new DataError(`Worksheet "${name}" has no columns to query`, {
      worksheet: name,
    });
  }

  const columns = table.columns.map(
    (column, i) =>
      `${quoteIdentifier(column)} ${table.columnTypes[i] === "number" ? "REAL" : "TEXT"}`,
  );
  const placeholders = table.columns.map(() => "?").join(", ");

  try {
    db.exec(`CREATE TABLE ${quoteIdentifier(name)} (${columns.join(", ")})`);
    const insert = db.prepare(`INSERT INTO ${quoteIdentifier(name)} VALUES (${placeholders})`);
    db.transaction((rows: CellValue[][]) => {
      for (const row of rows) {
        insert.run(...row);
      }
    })(table.rows);
  } catch (error) {
    throw new DataError(
      `Worksheet "${name}" cannot be loaded for querying: ${errorMessage(error)}`,
      { worksheet: name },
    );
  }
}

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number" || typeof value === "string") {
    return value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  return String(value);
}

/**
 * A column is numeric when every non-null cell is a number
 */
function toResultTable(columns: string[], rawRows: unknown[]): Table {
  const seen = new Set<string>();
  for (const column of columns) {
    if (seen.has(column)) {
      throw new DataError(`Query returns column "${column}" more than once; alias it`);
    }
    seen.add(column);
  }

  const rows = rawRows.map((row) =>
    columns.map((_, i) => (Array.isArray(row) ? toCellValue(row[i]) : null)),
  );

  const columnTypes: ColumnType[] = columns.map((_, i) => {
    const present = rows.map((row) => row[i]).filter((cell) => cell !== null);
    return present.length > 0 && present.every((cell) => typeof cell === "number")
      ? "number"
      : "string";
  });

  for (const row of rows) {
    columnTypes.forEach((type, i) => {
      const cell = row[i];
      if (type === "string" && typeof cell === "number") {
        row[i] = String(cell);
      }
    });
  }

  return { columns, columnTypes, rows };
}

/**
 * Run one SELECT statement over worksheets loaded on demand
 *
 * @throws {ConfigError} When the SQL does not compile or returns no rows
 * @throws {DataError} When a worksheet cannot become a table or the result
 * repeats a column name
 */
export async function runSqlQuery(sql: string, loadWorksheet: WorksheetLoader): Promise<Table> {
  const db = new Database(":memory:");
  const loaded = new Set<string>();

  try {
    for (;;) {
      let statement: Database.Statement;
      try {
        statement = db.prepare(sql);
      } catch (error) {
        const missing = missingTableName(error);
        if (missing === undefined || loaded.has(missing.toLowerCase())) {
          throw new ConfigError(`SQL query failed: ${errorMessage(error)}`, { field: "sql" });
        }
        if (loaded.size >= MAX_QUERY_WORKSHEETS) {
          throw new ConfigError(
            `SQL query names more than ${MAX_QUERY_WORKSHEETS} worksheets`,
            { field: "sql" },
          );
        }
        loadTable(db, missing, await loadWorksheet(missing));
        loaded.add(missing.toLowerCase());
        logger.debug("Worksheet loaded for query", { worksheet: missing });
        continue;
      }

      if (!statement.reader) {
        throw new ConfigError("SQL query must return rows (SELECT ...)", { field: "sql" });
      }
      const columns = statement.columns().map((column) => column.name);
      return toResultTable(columns, statement.raw(true).all());
    }
  } finally {
    db.close();
  }
}
