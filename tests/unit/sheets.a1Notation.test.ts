/**
 * Unit tests for A1 notation helpers
 *
 * No network
 */

import { describe, it, expect } from "vitest";
import {
  colIndexToLetter,
  qualifyRange,
  quoteSheetTitle,
} from "@/utils/sheets/sheetsHelpers";

describe("colIndexToLetter", () => {
  it.each([
    [0, "A"],
    [25, "Z"],
    [26, "AA"],
    [27, "AB"],
    [51, "AZ"],
    [52, "BA"],
    [701, "ZZ"],
    [702, "AAA"],
  ])("maps %i to %s", (index, letters) => {
    expect(colIndexToLetter(index)).toBe(letters);
  });

  it("rejects negative and fractional indices", () => {
    expect(() => colIndexToLetter(-1)).toThrow(/out of range/);
    expect(() => colIndexToLetter(1.5)).toThrow(/out of range/);
  });
});

describe("quoteSheetTitle", () => {
  it("wraps the title in single quotes", () => {
    expect(quoteSheetTitle("Sheet 1")).toBe("'Sheet 1'");
  });

  it("doubles embedded single quotes", () => {
    expect(quoteSheetTitle("Bob's data")).toBe("'Bob''s data'");
  });
});

describe("qualifyRange", () => {
  it("prefixes the quoted title", () => {
    expect(qualifyRange("Q1 Sales", "A1:C3")).toBe("'Q1 Sales'!A1:C3");
  });
});
