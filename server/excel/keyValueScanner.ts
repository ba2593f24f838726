import { DEFAULT_PROCESSING_CONFIG, type KeyValueExtractConfig } from "../config/excelConfig";
import { InvalidAddressError, isExcelProcessingError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { columnToIndex, offsetAddress, resolveAddress } from "./cellAddress";
import { KeyValueExtractResult, ValidationResult, failed } from "./models";
import { setEntry } from "./records";
import type { CellValue, WorkbookHandle, WorksheetHandle } from "./types";

const log = createLogger("keyValueScanner");

export interface ScanOptions {
  /** Upper bound on rows read; reaching it stops the scan and marks it truncated. */
  maxRows?: number;
  /** Rightmost column (1-based) the value cell may occupy. */
  maxColumns?: number;
  trimWhitespace?: boolean;
}

export interface ScanOutcome {
  pairs: Record<string, CellValue>;
  rowsScanned: number;
  truncated: boolean;
}

/** Only a blank cell or an empty string ends the region; a whitespace key is still a key. */
const isEmptyKey = (value: CellValue): boolean => value === null || value === "";

function keyToString(value: CellValue): string {
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Walks a key column downward from `startCell`, reading each value one column to the right,
 * until the first empty key.
 */
export function scanRegion(worksheet: WorksheetHandle, startCell: string, options: ScanOptions = {}): ScanOutcome {
  const start = resolveAddress(startCell);
  if (options.maxColumns !== undefined && columnToIndex(start.column) + 1 > options.maxColumns) {
    throw new InvalidAddressError(startCell, `value column lies beyond column ${options.maxColumns}`);
  }

  const pairs: Record<string, CellValue> = {};
  let keyAddress = startCell;
  let rowsScanned = 0;

  for (;;) {
    if (options.maxRows !== undefined && rowsScanned >= options.maxRows) {
      return { pairs, rowsScanned, truncated: true };
    }
    const key = worksheet.getCell(keyAddress);
    if (isEmptyKey(key)) break;

    const value = worksheet.getCell(offsetAddress(keyAddress, 0, 1));
    const name = options.trimWhitespace ? keyToString(key).trim() : keyToString(key);
    setEntry(pairs, name, options.trimWhitespace && typeof value === "string" ? value.trim() : value);

    rowsScanned += 1;
    keyAddress = offsetAddress(keyAddress, 1, 0);
  }

  return { pairs, rowsScanned, truncated: false };
}

export function scanKeyValuePairs(
  worksheet: WorksheetHandle,
  startCell: string,
  options: ScanOptions = {}
): Record<string, CellValue> {
  return scanRegion(worksheet, startCell, options).pairs;
}

/** Looks the tab up, scans it under `config`, and reports what happened as validation results. */
export function extractKeyValueRegion(
  workbook: WorkbookHandle,
  tabName: string,
  startCell: string,
  config: KeyValueExtractConfig = DEFAULT_PROCESSING_CONFIG.keyValue
): KeyValueExtractResult {
  const results: ValidationResult[] = [];
  const location = `${tabName}!${startCell}`;

  const worksheet = workbook.sheet(tabName);
  if (!worksheet) {
    results.push(
      failed("worksheet_lookup", `Worksheet '${tabName}' not found`, tabName, "ERROR", {
        available_tabs: workbook.sheetNames(),
      })
    );
    return new KeyValueExtractResult({ success: false, extractedPairs: {}, rowsScanned: 0, truncated: false, validationResults: results });
  }

  let outcome: ScanOutcome;
  try {
    outcome = scanRegion(worksheet, startCell, {
      maxRows: config.maxRows,
      maxColumns: config.validateCellReferences ? config.maxColumns : undefined,
      trimWhitespace: config.trimWhitespace,
    });
  } catch (error) {
    if (!isExcelProcessingError(error)) throw error;
    results.push(
      failed("start_cell", error.message, location, "ERROR", { code: error.code })
    );
    return new KeyValueExtractResult({ success: false, extractedPairs: {}, rowsScanned: 0, truncated: false, validationResults: results });
  }

  if (outcome.truncated) {
    const warning = failed(
      "max_rows",
      `Key/value scan of '${tabName}' stopped after ${config.maxRows} rows before reaching an empty key`,
      location,
      "WARNING",
      { max_rows: config.maxRows }
    );
    results.push(warning);
    if (config.logValidationWarnings) {
      log.warn(warning.message, { tabName, startCell, maxRows: config.maxRows });
    }
  }

  return new KeyValueExtractResult({
    success: true,
    extractedPairs: outcome.pairs,
    rowsScanned: outcome.rowsScanned,
    truncated: outcome.truncated,
    validationResults: results,
  });
}
