/**
 * Worksheet dump for the command-line entrypoint
 *
 * Reads the connection's default worksheet and renders one JSON object per
 * row. Controlled by:
 *   READ_NROWS: maximum number of data rows (optional)
 *   READ_NO_HEADER=1: treat the first row as data
 */

import type { GSheetsConnection } from "@/connection";
import { tableToRecords } from "@/table";
import { ConfigError } from "@/errors";
import * as logger from "@/logger";

type Env = Record<string, string | undefined>;

function parseRowLimit(raw: string | undefined): number | undefined {
  if (raw === undefined || raw === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`READ_NROWS must be a non-negative integer, got "${raw}"`, {
      field: "READ_NROWS",
    });
  }
  return value;
}

export async function readWorksheetLines(
  connection: GSheetsConnection,
  env: Env = process.env,
): Promise<string[]> {
  const table = await connection.read({
    nRows: parseRowLimit(env.READ_NROWS),
    header: env.READ_NO_HEADER !== "1",
  });

  logger.info("Worksheet read", {
    mode: connection.mode,
    columns: table.columns.length,
    rows: table.rows.length,
    columnTypes: Object.fromEntries(
      table.columns.map((name, i) => [name, table.columnTypes[i]]),
    ),
  });

  return tableToRecords(table).map((record) => JSON.stringify(record));
}
