/**
 * Reference resolution
 *
 * Turns loose spreadsheet/worksheet input into tagged references with
 * canonical keys. Pure: no network access.
 */

import type {
  ConnectionMode,
  Credential,
  SpreadsheetReference,
  WorksheetInput,
  WorksheetReference,
} from "@/types";
import {
  NUMERIC_WORKSHEET_PATTERN,
  SPREADSHEET_KEY_PATTERN,
  SPREADSHEET_URL_GID_PATTERN,
  SPREADSHEET_URL_KEY_PATTERN,
  URL_SCHEME_PATTERN,
} from "@/constants";
import { ConfigError } from "@/errors";

/**
 * Resolve a spreadsheet id, URL or (service account only) title
 *
 * A bare token in the key character set is an id in both modes. Service
 * account clients fall back to a title lookup when no spreadsheet has that
 * id, so single-word titles still open.
 *
 * @throws {ConfigError} On empty input, a URL without a spreadsheet key, or a
 * title under public access
 */
export function resolveSpreadsheetReference(
  raw: string,
  credential: Credential,
): SpreadsheetReference {
  const value = raw.trim();
  if (!value) {
    throw new ConfigError("spreadsheet reference is empty", {
      field: "spreadsheet",
    });
  }

  if (URL_SCHEME_PATTERN.test(value)) {
    const keyMatch = value.match(SPREADSHEET_URL_KEY_PATTERN);
    if (!keyMatch) {
      throw new ConfigError(
        `"${value}" is not a Google Sheets URL. Expected https://docs.google.com/spreadsheets/d/<id>/...`,
        { field: "spreadsheet" },
      );
    }
    const gidMatch = value.match(SPREADSHEET_URL_GID_PATTERN);
    return gidMatch
      ? { kind: "url", key: keyMatch[1], url: value, gid: Number(gidMatch[1]) }
      : { kind: "url", key: keyMatch[1], url: value };
  }

  if (SPREADSHEET_KEY_PATTERN.test(value)) {
    return { kind: "id", key: value };
  }

  if (credential.kind === "none") {
    throw new ConfigError(
      `Spreadsheet "${value}" looks like a title. Opening spreadsheets by title ` +
        "needs service account credentials; public access takes a URL or id.",
      { field: "spreadsheet" },
    );
  }

  return { kind: "name", name: value };
}

function numericWorksheet(value: number, mode: ConnectionMode): WorksheetReference {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(
      `worksheet must be a non-negative integer, got ${value}`,
      { field: "worksheet" },
    );
  }
  return mode === "read_only"
    ? { kind: "gid", gid: value }
    : { kind: "index", index: value };
}

/**
 * Resolve a worksheet title, number or reference
 *
 * Numbers mean a gid on public connections and a tab index on service
 * account connections. Absent input falls back to the gid carried by the
 * spreadsheet URL, then to the first worksheet.
 */
export function resolveWorksheetReference(
  raw: WorksheetInput | undefined,
  mode: ConnectionMode,
  urlGid?: number,
): WorksheetReference {
  if (typeof raw === "object") {
    return raw;
  }

  if (typeof raw === "number") {
    return numericWorksheet(raw, mode);
  }

  const value = raw?.trim() ?? "";
  if (value === "") {
    return urlGid === undefined ? { kind: "default" } : { kind: "gid", gid: urlGid };
  }

  if (NUMERIC_WORKSHEET_PATTERN.test(value)) {
    return numericWorksheet(Number(value), mode);
  }

  return { kind: "title", title: value };
}

export function canonicalSpreadsheetKey(ref: SpreadsheetReference): string {
  return ref.kind === "name" ? `name:${ref.name}` : `id:${ref.key}`;
}

export function canonicalWorksheetKey(ref: WorksheetReference): string {
  switch (ref.kind) {
    case "title":
      return `title:${ref.title}`;
    case "gid":
      return `gid:${ref.gid}`;
    case "index":
      return `index:${ref.index}`;
    case "default":
      return "default";
  }
}

/**
 * Human-readable form used in log lines and error messages
 */
export function describeSpreadsheet(ref: SpreadsheetReference): string {
  return ref.kind === "name" ? `"${ref.name}"` : ref.key;
}

export function describeWorksheet(ref: WorksheetReference): string {
  switch (ref.kind) {
    case "title":
      return `"${ref.title}"`;
    case "gid":
      return `gid ${ref.gid}`;
    case "index":
      return `#${ref.index}`;
    case "default":
      return "(first)";
  }
}
