import ExcelJS from "exceljs";
import fs from "fs/promises";
import path from "path";
import * as XLSX from "xlsx";
import { ErrorCodes, FileError, ProcessingError, toErrorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { formatAddress, indexToColumn, resolveAddress } from "./cellAddress";
import type { CellValue, WorkbookHandle, WorkbookProperties, WorksheetDimensions, WorksheetHandle } from "./types";

const log = createLogger("workbookHandle");

type ExcelJsResult = ExcelJS.CellFormulaValue["result"];

function fromFormulaResult(result: ExcelJsResult): CellValue {
  if (result === undefined || result === null) return null;
  if (result instanceof Date) return result;
  if (typeof result === "object") return null;
  return result;
}

/** Formula cells yield their cached result, rich text and hyperlinks their text, errors null. */
export function normalizeExcelJsValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  if (value instanceof Date) return value;
  if ("richText" in value) return value.richText.map(run => run.text).join("");
  if ("hyperlink" in value) return typeof value.text === "string" ? value.text : value.hyperlink;
  if ("error" in value) return null;
  if ("formula" in value || "sharedFormula" in value) return fromFormulaResult(value.result);
  return null;
}

class ExcelJsWorksheet implements WorksheetHandle {
  constructor(private readonly worksheet: ExcelJS.Worksheet) {}

  get name(): string {
    return this.worksheet.name;
  }

  get dimensions(): WorksheetDimensions {
    return { rowCount: this.worksheet.rowCount, columnCount: this.worksheet.columnCount };
  }

  getCell(address: string): CellValue {
    const { column, row } = resolveAddress(address);
    return normalizeExcelJsValue(this.worksheet.getCell(`${column}${row}`).value);
  }

  *cells(): Iterable<[string, CellValue]> {
    const found: Array<[string, CellValue]> = [];
    this.worksheet.eachRow({ includeEmpty: false }, row => {
      row.eachCell({ includeEmpty: false }, cell => {
        const value = normalizeExcelJsValue(cell.value);
        if (value !== null) found.push([cell.address, value]);
      });
    });
    yield* found;
  }
}

class ExcelJsWorkbook implements WorkbookHandle {
  private closed = false;

  constructor(private readonly workbook: ExcelJS.Workbook, readonly filePath?: string) {}

  get properties(): WorkbookProperties {
    return {
      title: this.workbook.title || undefined,
      creator: this.workbook.creator || undefined,
      created: this.workbook.created,
      modified: this.workbook.modified,
      lastModifiedBy: this.workbook.lastModifiedBy || undefined,
    };
  }

  sheetNames(): string[] {
    this.assertOpen();
    return this.workbook.worksheets.map(ws => ws.name);
  }

  sheet(name: string): WorksheetHandle | undefined {
    this.assertOpen();
    const worksheet = this.workbook.getWorksheet(name);
    return worksheet ? new ExcelJsWorksheet(worksheet) : undefined;
  }

  close(): void {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ProcessingError("Workbook handle has been closed", ErrorCodes.PROCESSING_FAILED, { filePath: this.filePath });
    }
  }
}

function fromSheetJsCell(cell: XLSX.CellObject | undefined): CellValue {
  if (!cell || cell.t === "e" || cell.t === "z") return null;
  const value = cell.v;
  if (value === undefined) return null;
  return value;
}

class SheetJsWorksheet implements WorksheetHandle {
  constructor(readonly name: string, private readonly worksheet: XLSX.WorkSheet) {}

  get dimensions(): WorksheetDimensions {
    const ref = this.worksheet["!ref"];
    if (!ref) return { rowCount: 0, columnCount: 0 };
    const range = XLSX.utils.decode_range(ref);
    return { rowCount: range.e.r + 1, columnCount: range.e.c + 1 };
  }

  getCell(address: string): CellValue {
    const { column, row } = resolveAddress(address);
    return fromSheetJsCell(this.worksheet[`${column}${row}`]);
  }

  *cells(): Iterable<[string, CellValue]> {
    const ref = this.worksheet["!ref"];
    if (!ref) return;
    const range = XLSX.utils.decode_range(ref);
    for (let r = range.s.r; r <= range.e.r; r++) {
      for (let c = range.s.c; c <= range.e.c; c++) {
        const address = formatAddress({ column: indexToColumn(c + 1), row: r + 1 });
        const value = fromSheetJsCell(this.worksheet[address]);
        if (value !== null) yield [address, value];
      }
    }
  }
}

class SheetJsWorkbook implements WorkbookHandle {
  private closed = false;

  constructor(private readonly workbook: XLSX.WorkBook, readonly filePath?: string) {}

  get properties(): WorkbookProperties {
    const props = this.workbook.Props;
    return {
      title: props?.Title,
      creator: props?.Author,
      created: props?.CreatedDate,
      modified: props?.ModifiedDate,
      lastModifiedBy: props?.LastAuthor,
    };
  }

  sheetNames(): string[] {
    this.assertOpen();
    return [...this.workbook.SheetNames];
  }

  sheet(name: string): WorksheetHandle | undefined {
    this.assertOpen();
    if (!this.workbook.SheetNames.includes(name)) return undefined;
    const worksheet = this.workbook.Sheets[name];
    return worksheet ? new SheetJsWorksheet(name, worksheet) : undefined;
  }

  close(): void {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ProcessingError("Workbook handle has been closed", ErrorCodes.PROCESSING_FAILED, { filePath: this.filePath });
    }
  }
}

export async function loadXlsxWorkbook(buffer: Buffer, filePath?: string): Promise<WorkbookHandle> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(buffer);
  return new ExcelJsWorkbook(workbook, filePath);
}

export function loadXlsWorkbook(buffer: Buffer, filePath?: string): WorkbookHandle {
  const workbook = XLSX.read(buffer, { type: "buffer", cellDates: true, cellFormula: false, cellStyles: false });
  return new SheetJsWorkbook(workbook, filePath);
}

/**
 * Opens `.xlsx` through ExcelJS and `.xls` through SheetJS. Formula cells expose the value
 * cached at last save; nothing is recalculated.
 */
export async function openWorkbook(filePath: string): Promise<WorkbookHandle> {
  const extension = path.extname(filePath).toLowerCase();
  if (extension !== ".xlsx" && extension !== ".xls") {
    throw new FileError(`Unsupported workbook extension '${extension}'`, filePath, ErrorCodes.FILE_FORMAT_INVALID);
  }

  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    throw new FileError(`Cannot read workbook: ${toErrorMessage(error)}`, filePath, ErrorCodes.FILE_NOT_FOUND, error);
  }

  try {
    const handle = extension === ".xlsx" ? await loadXlsxWorkbook(buffer, filePath) : loadXlsWorkbook(buffer, filePath);
    log.debug("Workbook opened", { filePath, sheetCount: handle.sheetNames().length });
    return handle;
  } catch (error) {
    throw new FileError(`Cannot open workbook: ${toErrorMessage(error)}`, filePath, ErrorCodes.FILE_CORRUPTED, error);
  }
}
