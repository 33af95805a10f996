/**
 * CSV parser for the public export endpoint
 *
 * Handles quoted fields, doubled quotes and newlines inside quotes.
 * Line endings are normalized to \n first.
 *
 * @example
 * parseCsv('"Name, Full",Age\n"Alice ""Al""",30')
 * // => [['Name, Full', 'Age'], ['Alice "Al"', '30']]
 */

import { DataError } from "@/errors";

export function parseCsv(csvText: string): string[][] {
  const rows: string[][] = [];
  let currentRow: string[] = [];
  let currentField = "";
  let inQuotes = false;
  let i = 0;

  const text = csvText.replace(/\r\n/g, "\n").replace(/\r/g, "\n");

  while (i < text.length) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          currentField += '"';
          i += 2;
        } else {
          inQuotes = false;
          i++;
        }
      } else {
        currentField += char;
        i++;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ",") {
      currentRow.push(currentField);
      currentField = "";
    } else if (char === "\n") {
      currentRow.push(currentField);
      rows.push(currentRow);
      currentRow = [];
      currentField = "";
    } else {
      currentField += char;
    }
    i++;
  }

  if (inQuotes) {
    throw new DataError("CSV payload ends inside a quoted field", {
      row: rows.length,
    });
  }

  // Last line without a trailing newline
  if (currentField || currentRow.length > 0) {
    currentRow.push(currentField);
    rows.push(currentRow);
  }

  return rows;
}
