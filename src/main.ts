/**
 * Entrypoint — prints the configured worksheet as JSON lines
 *
 * Usage:
 *   npx tsx src/main.ts
 *
 * Environment variables (a local .env file is loaded):
 *   - GSHEETS_SPREADSHEET: spreadsheet URL, id or (service account) title
 *   - GSHEETS_WORKSHEET: worksheet title, gid or index (optional)
 *   - GSHEETS_SERVICE_ACCOUNT_FILE: service account JSON key (optional)
 *   - READ_NROWS, READ_NO_HEADER: see cli/readWorksheet
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 */

import "dotenv/config";
import { GSheetsConnection } from "./connection";
import { readWorksheetLines } from "./cli/readWorksheet";
import * as logger from "./logger";

async function main(): Promise<void> {
  const connection = GSheetsConnection.fromEnv();
  const lines = await readWorksheetLines(connection);
  for (const line of lines) {
    process.stdout.write(`${line}\n`);
  }
}

main().catch((error: unknown) => {
  logger.error("Fatal error", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
