import { DEFAULT_PROCESSING_CONFIG, type ExcelProcessingConfig } from "../config/excelConfig";
import { isExcelProcessingError, toErrorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { extractKeyValueRegion } from "./keyValueScanner";
import { ProcessingStats, TabExtractResult, ValidationResult, failed } from "./models";
import { setEntry } from "./records";
import { extractTabs } from "./tabExtractor";
import type { CellValue, ParsedWorkbook, SchemaRegistry, WorkbookHandle } from "./types";
import { openWorkbook } from "./workbookHandle";

const log = createLogger("workbookParser");

export const METADATA_TAB_NAME = "_json_metadata";
export const SCHEMA_TAB_NAME = "_json_schema";
export const TOP_LEFT_KEY_VALUE_CELL = "$B$15";

export type ParseState = "Assembled" | "FailedAtOpen";

export interface ParseOptions {
  config?: ExcelProcessingConfig;
  stats?: ProcessingStats;
  /** Replaces the mapping read from the schema tab. */
  schemaMap?: Readonly<Record<string, string>>;
  referenceDate?: Date;
}

export interface ParsedWorkbookResult {
  state: ParseState;
  workbook?: ParsedWorkbook;
  validationResults: ValidationResult[];
  tabResults: TabExtractResult[];
  /** Set when the workbook could not be opened. */
  error?: string;
}

function freezeParsed(
  metadata: Record<string, CellValue>,
  schemas: Record<string, string>,
  tabContents: Record<string, Record<string, CellValue>>
): ParsedWorkbook {
  const frozenTabs: Record<string, Readonly<Record<string, CellValue>>> = {};
  for (const [tab, data] of Object.entries(tabContents)) {
    setEntry(frozenTabs, tab, Object.freeze({ ...data }));
  }
  return Object.freeze({
    metadata: Object.freeze({ ...metadata }),
    schemas: Object.freeze({ ...schemas }),
    tabContents: Object.freeze(frozenTabs),
  });
}

function readRegion(
  workbook: WorkbookHandle,
  tabName: string,
  config: ExcelProcessingConfig,
  stats: ProcessingStats | undefined,
  results: ValidationResult[]
): Record<string, CellValue> {
  const region = extractKeyValueRegion(workbook, tabName, TOP_LEFT_KEY_VALUE_CELL, config.keyValue);
  results.push(...region.validationResults);
  stats?.incrementProcessed({ rows: region.rowsScanned, cells: region.rowsScanned * 2 });
  return { ...region.extractedPairs };
}

/** Runs ReadMetadata through Assemble on an already-open workbook. */
export function parseWorkbook(workbook: WorkbookHandle, registry: SchemaRegistry, options: ParseOptions = {}): ParsedWorkbookResult {
  const config = options.config ?? DEFAULT_PROCESSING_CONFIG;
  const results: ValidationResult[] = [];
  const sheetNames = workbook.sheetNames();

  let metadata: Record<string, CellValue> = {};
  if (sheetNames.includes(METADATA_TAB_NAME)) {
    metadata = readRegion(workbook, METADATA_TAB_NAME, config, options.stats, results);
  } else {
    results.push(failed("metadata_tab", `Workbook has no '${METADATA_TAB_NAME}' tab`, METADATA_TAB_NAME, "INFO"));
  }

  let schemaMap: Record<string, CellValue> = {};
  if (options.schemaMap) {
    schemaMap = { ...options.schemaMap };
  } else if (sheetNames.includes(SCHEMA_TAB_NAME)) {
    schemaMap = readRegion(workbook, SCHEMA_TAB_NAME, config, options.stats, results);
  } else {
    results.push(failed("schema_tab", `Spreadsheet must have a '${SCHEMA_TAB_NAME}' tab`, SCHEMA_TAB_NAME, "WARNING"));
    log.warn("Schema tab missing; no tabs extracted", { filePath: workbook.filePath });
  }

  const extraction = extractTabs(workbook, schemaMap, registry, {}, {
    config: config.tab,
    stats: options.stats,
    detailedLogging: config.parse.detailedLogging,
    skipInvalidTabs: config.parse.skipInvalidTabs,
    referenceDate: options.referenceDate,
  });
  results.push(...extraction.validationResults);

  return {
    state: "Assembled",
    workbook: freezeParsed(metadata, extraction.schemas, extraction.tabContents),
    validationResults: results,
    tabResults: extraction.tabResults,
  };
}

/** Opens, parses and closes a workbook file. An open failure is the only error reported. */
export async function parseWorkbookFile(
  filePath: string,
  registry: SchemaRegistry,
  options: ParseOptions = {}
): Promise<ParsedWorkbookResult> {
  let workbook: WorkbookHandle;
  try {
    workbook = await openWorkbook(filePath);
  } catch (error) {
    if (!isExcelProcessingError(error)) throw error;
    log.error("Workbook open failed", { filePath, error: error.message });
    return {
      state: "FailedAtOpen",
      validationResults: [failed("workbook_loading", error.message, filePath, "ERROR", { code: error.code })],
      tabResults: [],
      error: error.message,
    };
  }

  try {
    return parseWorkbook(workbook, registry, options);
  } catch (error) {
    log.error("Workbook parse failed", { filePath, error: toErrorMessage(error) });
    throw error;
  } finally {
    workbook.close();
  }
}
