/**
 * Unit tests for the worksheet dump used by the entrypoint
 *
 * In-memory sheets backend, no network
 */

import { describe, it, expect, beforeEach } from "vitest";
import { GSheetsConnection } from "@/connection";
import { readWorksheetLines } from "@/cli/readWorksheet";
import { ConfigError } from "@/errors";
import {
  createInMemorySheets,
  type InMemorySheets,
} from "../helpers/inMemorySheetsClient";

const KEY = "1aBcDeFgHiJkLmNoPqRsTuVwXyZ_0123456789";

describe("Unit: readWorksheetLines", () => {
  let backend: InMemorySheets;
  let connection: GSheetsConnection;

  beforeEach(() => {
    backend = createInMemorySheets("read_only");
    backend.addSpreadsheet(KEY, "Budget", [
      {
        title: "Sheet1",
        grid: [
          ["a", "b"],
          ["1", "2"],
          ["3", ""],
        ],
      },
    ]);
    connection = new GSheetsConnection(
      { spreadsheet: KEY },
      { createClient: backend.createClient },
    );
  });

  it("renders one JSON object per row", async () => {
    expect(await readWorksheetLines(connection, {})).toEqual([
      '{"a":1,"b":2}',
      '{"a":3,"b":null}',
    ]);
  });

  it("honours READ_NROWS", async () => {
    expect(await readWorksheetLines(connection, { READ_NROWS: "1" })).toEqual([
      '{"a":1,"b":2}',
    ]);
  });

  it("treats the first row as data with READ_NO_HEADER=1", async () => {
    expect(
      await readWorksheetLines(connection, { READ_NO_HEADER: "1", READ_NROWS: "1" }),
    ).toEqual(['{"0":"a","1":"b"}']);
  });

  it("rejects a malformed READ_NROWS", async () => {
    await expect(readWorksheetLines(connection, { READ_NROWS: "ten" })).rejects.toBeInstanceOf(
      ConfigError,
    );
  });
});
