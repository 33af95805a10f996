/**
 * Unit tests for PublicSheetsClient
 *
 * All HTTP goes through the mock harness. No network.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { PublicSheetsClient } from "@/clients/googleSheets";
import { ConfigError, ModeError, NotFoundError, TransportError } from "@/errors";
import { createMockHttp, type MockHttp } from "../../helpers/mockHttp";

const KEY = "ABC123";
const EXPORT_URL = `https://docs.google.com/spreadsheets/d/${KEY}/export`;
const GVIZ_URL = `https://docs.google.com/spreadsheets/d/${KEY}/gviz/tq`;

describe("Unit: PublicSheetsClient", () => {
  let mock: MockHttp;
  let client: PublicSheetsClient;

  beforeEach(() => {
    mock = createMockHttp();
    client = new PublicSheetsClient(mock.request);
  });

  it("downloads the first worksheet as CSV", async () => {
    mock.on("GET", EXPORT_URL, "a,b\n1,2\n");

    const spreadsheet = await client.openSpreadsheet({ kind: "id", key: KEY });
    const worksheet = await spreadsheet.worksheet({ kind: "default" });

    expect(worksheet.key).toBe("default");
    expect(await worksheet.getAllValues()).toEqual([
      ["a", "b"],
      ["1", "2"],
    ]);
    expect(mock.getRecordedRequests()).toEqual([
      { method: "GET", url: EXPORT_URL, query: { format: "csv" } },
    ]);
  });

  it("selects a worksheet by gid", async () => {
    mock.on("GET", EXPORT_URL, "x\n");

    const spreadsheet = await client.openSpreadsheet({
      kind: "url",
      key: KEY,
      url: `https://docs.google.com/spreadsheets/d/${KEY}/edit#gid=7`,
      gid: 7,
    });
    const worksheet = await spreadsheet.worksheet({ kind: "gid", gid: 7 });
    await worksheet.getAllValues();

    expect(worksheet.key).toBe("gid:7");
    expect(mock.getRecordedRequests()[0].query).toEqual({ format: "csv", gid: 7 });
  });

  it("selects a worksheet by title through the visualization endpoint", async () => {
    mock.on("GET", GVIZ_URL, '"a","b"\n"1","2"\n');

    const spreadsheet = await client.openSpreadsheet({ kind: "id", key: KEY });
    const worksheet = await spreadsheet.worksheet({ kind: "title", title: "Q1 Sales" });

    expect(worksheet.title).toBe("Q1 Sales");
    expect(await worksheet.getAllValues()).toEqual([
      ["a", "b"],
      ["1", "2"],
    ]);
    expect(mock.getRecordedRequests()[0].query).toEqual({
      tqx: "out:csv",
      sheet: "Q1 Sales",
    });
  });

  it("reports a sign-in page as a spreadsheet that is not public", async () => {
    mock.onResponse("GET", EXPORT_URL, {
      status: 200,
      body: "<!DOCTYPE html><html><body>Sign in</body></html>",
      headers: { "content-type": "text/html; charset=utf-8" },
    });

    const spreadsheet = await client.openSpreadsheet({ kind: "id", key: KEY });
    const worksheet = await spreadsheet.worksheet({ kind: "default" });

    await expect(worksheet.getAllValues()).rejects.toThrow(
      `Spreadsheet ${KEY} is not publicly readable.`,
    );
  });

  it("translates a 404 into NotFoundError", async () => {
    mock.onResponse("GET", EXPORT_URL, { status: 404, body: "Not Found" });

    const spreadsheet = await client.openSpreadsheet({ kind: "id", key: KEY });
    const worksheet = await spreadsheet.worksheet({ kind: "gid", gid: 3 });

    const error = await worksheet.getAllValues().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({
      details: { status: 404, operation: "read", spreadsheet: KEY, worksheet: "gid:3" },
    });
  });

  it("translates a 500 into TransportError", async () => {
    mock.onResponse("GET", EXPORT_URL, { status: 500, body: "oops" });

    const spreadsheet = await client.openSpreadsheet({ kind: "id", key: KEY });
    const worksheet = await spreadsheet.worksheet({ kind: "default" });

    await expect(worksheet.getAllValues()).rejects.toBeInstanceOf(TransportError);
  });

  it("refuses titles, tab indices and worksheet listing", async () => {
    await expect(client.openSpreadsheet({ kind: "name", name: "Budget" })).rejects.toBeInstanceOf(
      ConfigError,
    );

    const spreadsheet = await client.openSpreadsheet({ kind: "id", key: KEY });
    await expect(spreadsheet.worksheet({ kind: "index", index: 1 })).rejects.toBeInstanceOf(
      ConfigError,
    );
    await expect(spreadsheet.listWorksheets()).rejects.toBeInstanceOf(ConfigError);
  });

  it("rejects every write with ModeError", async () => {
    const spreadsheet = await client.openSpreadsheet({ kind: "id", key: KEY });
    const worksheet = await spreadsheet.worksheet({ kind: "default" });

    await expect(worksheet.update("A1", [["x"]])).rejects.toBeInstanceOf(ModeError);
    await expect(worksheet.appendRows([["x"]])).rejects.toBeInstanceOf(ModeError);
    await expect(worksheet.clear()).rejects.toBeInstanceOf(ModeError);
    await expect(spreadsheet.addWorksheet("New", 10, 2)).rejects.toBeInstanceOf(ModeError);
    expect(mock.getRecordedRequests()).toHaveLength(0);
  });
});
