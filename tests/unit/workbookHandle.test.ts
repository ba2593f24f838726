import ExcelJS from "exceljs";
import fs from "fs/promises";
import path from "path";
import * as XLSX from "xlsx";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { loadXlsWorkbook, normalizeExcelJsValue, openWorkbook } from "../../server/excel/workbookHandle";
import { FileError, ProcessingError } from "../../server/utils/errors";
import { createTempDir, removeTempDir, writeWorkbook } from "../helpers/workbookFixtures";

describe("normalizeExcelJsValue", () => {
  it("flattens rich text, hyperlinks and formulas", () => {
    expect(normalizeExcelJsValue({ richText: [{ text: "North " }, { text: "Ridge" }] })).toBe("North Ridge");
    expect(normalizeExcelJsValue({ text: "Site map", hyperlink: "https://example.com/map" })).toBe("Site map");
    expect(normalizeExcelJsValue({ formula: "40+2", result: 42, date1904: false })).toBe(42);
    expect(normalizeExcelJsValue({ formula: "A1", date1904: false })).toBeNull();
    expect(normalizeExcelJsValue({ error: "#N/A" })).toBeNull();
  });

  it("passes scalars through", () => {
    expect(normalizeExcelJsValue("x")).toBe("x");
    expect(normalizeExcelJsValue(3)).toBe(3);
    expect(normalizeExcelJsValue(undefined)).toBeNull();
  });
});

describe("openWorkbook", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("reads cells by relative or absolute address", async () => {
    const filePath = await writeWorkbook(dir, "form.xlsx", { "Feedback Form": { B15: "version", C15: "v01.00", D16: 12.5 } }, { creator: "Field Team" });
    const workbook = await openWorkbook(filePath);

    expect(workbook.sheetNames()).toEqual(["Feedback Form"]);
    expect(workbook.properties.creator).toBe("Field Team");
    const sheet = workbook.sheet("Feedback Form");
    expect(sheet?.getCell("$C$15")).toBe("v01.00");
    expect(sheet?.getCell("D16")).toBe(12.5);
    expect(sheet?.getCell("Z99")).toBeNull();
    expect(workbook.sheet("Nope")).toBeUndefined();
    expect(Object.fromEntries(sheet ? [...sheet.cells()] : [])).toEqual({ B15: "version", C15: "v01.00", D16: 12.5 });
  });

  it("returns the cached result of formula cells", async () => {
    const book = new ExcelJS.Workbook();
    book.addWorksheet("Calc").getCell("A1").value = { formula: "40+2", result: 42, date1904: false };
    const filePath = path.join(dir, "calc.xlsx");
    await book.xlsx.writeFile(filePath);

    const workbook = await openWorkbook(filePath);
    expect(workbook.sheet("Calc")?.getCell("A1")).toBe(42);
  });

  it("refuses use after close", async () => {
    const workbook = await openWorkbook(await writeWorkbook(dir, "a.xlsx", { S: { A1: 1 } }));
    workbook.close();
    expect(() => workbook.sheetNames()).toThrow(ProcessingError);
  });

  it("maps failures to file errors", async () => {
    await expect(openWorkbook(path.join(dir, "data.csv"))).rejects.toMatchObject({ code: "FILE_FORMAT_INVALID" });
    await expect(openWorkbook(path.join(dir, "missing.xlsx"))).rejects.toMatchObject({ code: "FILE_NOT_FOUND" });

    const corrupt = path.join(dir, "corrupt.xlsx");
    await fs.writeFile(corrupt, "not a workbook");
    await expect(openWorkbook(corrupt)).rejects.toBeInstanceOf(FileError);
    await expect(openWorkbook(corrupt)).rejects.toMatchObject({ code: "FILE_CORRUPTED" });
  });
});

describe("SheetJS-backed workbooks", () => {
  const buildBuffer = (): Buffer => {
    const book = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      book,
      XLSX.utils.aoa_to_sheet([
        ["key", "value"],
        ["sector", "Oil & Gas"],
        ["count", 3],
      ]),
      "_json_metadata"
    );
    const out: unknown = XLSX.write(book, { type: "buffer", bookType: "xlsx" });
    if (!Buffer.isBuffer(out)) throw new Error("expected a buffer");
    return out;
  };

  it("exposes the same handle interface", () => {
    const workbook = loadXlsWorkbook(buildBuffer(), "legacy.xls");

    expect(workbook.sheetNames()).toEqual(["_json_metadata"]);
    const sheet = workbook.sheet("_json_metadata");
    expect(sheet?.getCell("$A$2")).toBe("sector");
    expect(sheet?.getCell("B3")).toBe(3);
    expect(sheet?.getCell("C9")).toBeNull();
    expect(sheet?.dimensions).toEqual({ rowCount: 3, columnCount: 2 });
    expect([...(sheet?.cells() ?? [])].map(([address]) => address)).toEqual(["A1", "B1", "A2", "B2", "A3", "B3"]);
  });
});
