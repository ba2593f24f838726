import { describe, it, expect } from "vitest";
import { createKeyValueExtractConfig } from "../../server/config/excelConfig";
import { extractKeyValueRegion, scanKeyValuePairs, scanRegion } from "../../server/excel/keyValueScanner";
import { InvalidAddressError } from "../../server/utils/errors";
import { MemoryWorkbook, MemoryWorksheet, keyValueCells } from "../helpers/memoryWorkbook";

describe("key/value scanner", () => {
  it("reads pairs until the first empty key", () => {
    const sheet = new MemoryWorksheet("_json_metadata", {
      ...keyValueCells({ version: "v01", sector: "Landfill" }),
      B18: "after_gap",
      C18: "ignored",
    });

    expect(scanKeyValuePairs(sheet, "$B$15")).toEqual({ version: "v01", sector: "Landfill" });
  });

  it("reads past a whitespace-only key", () => {
    const sheet = new MemoryWorksheet("s", { B15: "a", C15: 1, B16: "   ", C16: 2, B17: "b", C17: 3 });
    const outcome = scanRegion(sheet, "B15");
    expect(Object.keys(outcome.pairs)).toEqual(["a", "   ", "b"]);
    expect(outcome).toEqual({ pairs: { a: 1, "   ": 2, b: 3 }, rowsScanned: 3, truncated: false });
    expect(scanKeyValuePairs(sheet, "B15", { trimWhitespace: true })).toEqual({ a: 1, "": 2, b: 3 });
  });

  it("stores prototype-named keys as ordinary entries", () => {
    const sheet = new MemoryWorksheet("s", { B15: "__proto__", C15: 1, B16: "toString", C16: 2, B17: "b", C17: 3 });
    const pairs = scanKeyValuePairs(sheet, "B15");
    expect(Object.entries(pairs)).toEqual([
      ["__proto__", 1],
      ["toString", 2],
      ["b", 3],
    ]);
    expect(Object.getPrototypeOf(pairs)).toBe(Object.prototype);
  });

  it("keeps the last value for a repeated key", () => {
    const sheet = new MemoryWorksheet("s", { B15: "k", C15: "first", B16: "k", C16: "second" });
    expect(scanKeyValuePairs(sheet, "B15")).toEqual({ k: "second" });
  });

  it("keeps empty values for non-empty keys", () => {
    const sheet = new MemoryWorksheet("s", { B15: "blank" });
    expect(scanKeyValuePairs(sheet, "B15")).toEqual({ blank: null });
  });

  it("trims keys and string values when asked", () => {
    const sheet = new MemoryWorksheet("s", { B15: "  name ", C15: "  value  ", B16: 7, C16: 8 });
    expect(scanKeyValuePairs(sheet, "B15", { trimWhitespace: true })).toEqual({ name: "value", "7": 8 });
    expect(scanKeyValuePairs(sheet, "B15")).toEqual({ "  name ": "  value  ", "7": 8 });
  });

  it("stops at maxRows and marks the scan truncated", () => {
    const sheet = new MemoryWorksheet("s", keyValueCells({ a: 1, b: 2, c: 3 }));
    expect(scanRegion(sheet, "B15", { maxRows: 2 })).toEqual({ pairs: { a: 1, b: 2 }, rowsScanned: 2, truncated: true });
  });

  it("rejects a start column whose value column passes maxColumns", () => {
    const sheet = new MemoryWorksheet("s", {});
    expect(() => scanRegion(sheet, "Z1", { maxColumns: 26 })).toThrow(InvalidAddressError);
    expect(scanRegion(sheet, "Y1", { maxColumns: 26 }).pairs).toEqual({});
  });

  describe("extractKeyValueRegion", () => {
    it("reports a missing worksheet with the available tabs", () => {
      const workbook = new MemoryWorkbook({ Sheet1: {} });
      const result = extractKeyValueRegion(workbook, "_json_metadata", "$B$15");

      expect(result.success).toBe(false);
      expect(result.errors).toEqual(["Worksheet '_json_metadata' not found"]);
      expect(result.validationResults[0].fieldName).toBe("worksheet_lookup");
      expect(result.validationResults[0].context.available_tabs).toEqual(["Sheet1"]);
    });

    it("reports an invalid start cell", () => {
      const workbook = new MemoryWorkbook({ s: {} });
      const result = extractKeyValueRegion(workbook, "s", "B0");

      expect(result.success).toBe(false);
      expect(result.validationResults[0].fieldName).toBe("start_cell");
      expect(result.validationResults[0].context.code).toBe("INVALID_CELL_REFERENCE");
    });

    it("adds a warning when the row limit cuts the scan short", () => {
      const workbook = new MemoryWorkbook({ s: keyValueCells({ a: 1, b: 2 }) });
      const config = createKeyValueExtractConfig({ maxRows: 1, logValidationWarnings: false });
      const result = extractKeyValueRegion(workbook, "s", "$B$15", config);

      expect(result.success).toBe(true);
      expect(result.extractedPairs).toEqual({ a: 1 });
      expect(result.truncated).toBe(true);
      expect(result.warnings).toEqual(["Key/value scan of 's' stopped after 1 rows before reaching an empty key"]);
      expect(result.pairsCount).toBe(1);
    });
  });
});
