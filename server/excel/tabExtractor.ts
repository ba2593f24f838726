import { DEFAULT_PROCESSING_CONFIG, type TabExtractConfig } from "../config/excelConfig";
import { DataError, ErrorCodes, isExcelProcessingError, toErrorMessage } from "../utils/errors";
import { createLogger, type Logger } from "../utils/logger";
import { ProcessingStats, TabExtractResult, ValidationResult, failed, hasErrors } from "./models";
import { hasEntry, setEntry } from "./records";
import { resolveSchema } from "./schemaResolver";
import type { CellValue, ExtractedRecord, FieldDefinition, Schema, SchemaRegistry, WorkbookHandle, WorksheetHandle } from "./types";
import { sanitizeUnicode, validateDataFormat } from "./validation/constraints";
import { coerceValue, isEmptyValue } from "./valueCoercer";

const log = createLogger("tabExtractor");

/** Stored for a drop-down whose cell is empty or holds an unusable value. */
export const PLEASE_SELECT = "Please Select";

export const COMPOUND_LAT_LONG_KEY = "lat_and_long";

export interface TabExtractOptions {
  config?: TabExtractConfig;
  stats?: ProcessingStats;
  detailedLogging?: boolean;
  /** When false, an unresolved schema or missing worksheet is an ERROR instead of a WARNING. */
  skipInvalidTabs?: boolean;
  referenceDate?: Date;
}

export interface TabExtractionOutcome {
  tabContents: Record<string, ExtractedRecord>;
  schemas: Record<string, string>;
  validationResults: ValidationResult[];
  tabResults: TabExtractResult[];
}

export interface ParsedSoFar {
  tabContents?: Readonly<Record<string, Readonly<ExtractedRecord>>>;
}

/**
 * Replaces `lat_and_long` with `lat_arb` and `long_arb`, split on its single comma.
 * An empty value is dropped without replacement; any other part count throws.
 */
export function splitCompoundKeys(record: Readonly<ExtractedRecord>): ExtractedRecord {
  if (!Object.prototype.hasOwnProperty.call(record, COMPOUND_LAT_LONG_KEY)) {
    return { ...record };
  }

  const { [COMPOUND_LAT_LONG_KEY]: value, ...rest } = record;
  if (value === null || value === "") {
    return rest;
  }

  const parts = String(value).split(",");
  if (parts.length !== 2) {
    throw new DataError(
      "Lat long must be a blank or a comma separated list of lat/long pairs",
      COMPOUND_LAT_LONG_KEY,
      ErrorCodes.DATA_MALFORMED,
      { value, parts: parts.length }
    );
  }
  return { ...rest, lat_arb: parts[0], long_arb: parts[1] };
}

const clean = (value: CellValue): CellValue => (typeof value === "string" ? sanitizeUnicode(value) : value);

function readField(
  worksheet: WorksheetHandle,
  field: FieldDefinition,
  config: TabExtractConfig,
  referenceDate: Date | undefined,
  results: ValidationResult[]
): CellValue {
  const location = `${worksheet.name}!${field.valueAddress}`;
  let raw = worksheet.getCell(field.valueAddress);
  if (config.trimStrings && typeof raw === "string") {
    raw = raw.trim();
  }

  if (isEmptyValue(raw)) {
    if (field.isDropDown) return PLEASE_SELECT;
    switch (config.handleMissingValues) {
      case "null":
        return null;
      case "error":
        results.push(
          failed(field.name, `Missing value for field '${field.name}'`, location, "ERROR", {
            code: ErrorCodes.REQUIRED_FIELD_MISSING,
            value_type: field.valueType,
          })
        );
        return "";
      case "skip":
        return "";
    }
  }

  const coerced = coerceValue(raw, field.valueType, { strict: config.typeConversionStrict, referenceDate });
  if (!coerced.isValid) {
    if (field.isDropDown) {
      results.push(
        failed(field.name, `Drop-down value '${String(raw)}' replaced with '${PLEASE_SELECT}': ${coerced.message}`, location, "WARNING", coerced.context)
      );
      return PLEASE_SELECT;
    }
    results.push(failed(field.name, coerced.message, location, "ERROR", coerced.context));
    return clean(raw);
  }

  const value = clean(coerced.value);
  if ((field.valueType === "email" || field.valueType === "url") && typeof value === "string") {
    const format = validateDataFormat(value, field.valueType, field.name, location);
    if (!format.isValid) {
      results.push(failed(field.name, `Value does not look like a valid ${field.valueType}`, location, "WARNING", format.context));
    }
  }
  return value;
}

function checkLabel(worksheet: WorksheetHandle, field: FieldDefinition, config: TabExtractConfig, results: ValidationResult[]): boolean {
  if (!field.labelAddress || field.label === undefined) return false;
  let sheetLabel = worksheet.getCell(field.labelAddress);
  if (config.trimStrings && typeof sheetLabel === "string") sheetLabel = sheetLabel.trim();
  if (sheetLabel !== field.label) {
    results.push(
      failed(
        field.name,
        `Schema label and spreadsheet label differ for '${field.name}'`,
        `${worksheet.name}!${field.labelAddress}`,
        "WARNING",
        { schema_label: field.label, spreadsheet_label: sheetLabel }
      )
    );
  }
  return true;
}

/** Reads every declared field of `schema` from `worksheet`. */
export function extractTab(worksheet: WorksheetHandle, schema: Schema, options: TabExtractOptions = {}): TabExtractResult {
  const config = options.config ?? DEFAULT_PROCESSING_CONFIG.tab;
  const tabLog: Logger = log.child({ tabName: worksheet.name, schemaName: schema.schemaName });
  const results: ValidationResult[] = [];
  const data: ExtractedRecord = {};

  let fields = schema.fields;
  if (fields.length > config.maxFieldCount) {
    results.push(
      failed("max_field_count", `Schema declares ${fields.length} fields; only the first ${config.maxFieldCount} were read`, worksheet.name, "WARNING", {
        field_count: fields.length,
        max_field_count: config.maxFieldCount,
      })
    );
    fields = fields.slice(0, config.maxFieldCount);
  }

  for (const field of fields) {
    try {
      setEntry(data, field.name, readField(worksheet, field, config, options.referenceDate, results));
      const labelRead = checkLabel(worksheet, field, config, results);
      options.stats?.incrementProcessed({ cells: labelRead ? 2 : 1, fields: 1 });
    } catch (error) {
      if (!isExcelProcessingError(error)) throw error;
      results.push(
        failed(field.name, error.message, `${worksheet.name}!${field.valueAddress}`, "ERROR", { code: error.code })
      );
    }
    if (options.detailedLogging) {
      tabLog.debug("Field extracted", {
        field: field.name,
        address: field.valueAddress,
        value: hasEntry(data, field.name) ? data[field.name] : null,
      });
    }
  }

  let record = data;
  try {
    record = splitCompoundKeys(data);
  } catch (error) {
    if (!(error instanceof DataError)) throw error;
    results.push(failed(COMPOUND_LAT_LONG_KEY, error.message, worksheet.name, "ERROR", { ...error.details }));
    tabLog.warn("Compound key split failed", { error: error.message });
  }

  return new TabExtractResult({
    tabName: worksheet.name,
    schemaName: schema.schemaName,
    success: !hasErrors(results),
    extractedData: record,
    validationResults: results,
  });
}

function schemaNameOf(value: CellValue): string | undefined {
  if (value === null) return undefined;
  const text = value instanceof Date ? value.toISOString() : String(value).trim();
  return text === "" ? undefined : text;
}

/**
 * Extracts each `(tab, schema)` pair in turn. A tab whose schema or worksheet cannot be found
 * is reported and left out of `tabContents`; the remaining tabs are still extracted.
 */
export function extractTabs(
  workbook: WorkbookHandle,
  schemaMap: Readonly<Record<string, CellValue>>,
  registry: SchemaRegistry,
  parsedSoFar: ParsedSoFar = {},
  options: TabExtractOptions = {}
): TabExtractionOutcome {
  const skipSeverity = options.skipInvalidTabs === false ? "ERROR" : "WARNING";
  const tabContents: Record<string, ExtractedRecord> = {};
  for (const [tab, data] of Object.entries(parsedSoFar.tabContents ?? {})) {
    setEntry(tabContents, tab, { ...data });
  }
  const schemas: Record<string, string> = {};
  const validationResults: ValidationResult[] = [];
  const tabResults: TabExtractResult[] = [];

  for (const [tabName, declared] of Object.entries(schemaMap)) {
    const schemaName = schemaNameOf(declared);
    if (schemaName === undefined) {
      validationResults.push(failed("schema_resolution", `No schema declared for tab '${tabName}'`, tabName, skipSeverity));
      log.warn("Tab skipped: no schema declared", { tabName });
      continue;
    }
    const resolution = resolveSchema(schemaName, registry);
    if (!resolution.found) {
      validationResults.push(
        failed("schema_resolution", `Schema '${schemaName}' for tab '${tabName}' could not be resolved`, tabName, skipSeverity, {
          schema_name: schemaName,
        })
      );
      log.warn("Tab skipped: schema not found", { tabName, schemaName });
      continue;
    }
    setEntry(schemas, tabName, resolution.canonicalName);

    const worksheet = workbook.sheet(tabName);
    if (!worksheet) {
      validationResults.push(
        failed("worksheet_lookup", `Worksheet '${tabName}' not found in workbook`, tabName, skipSeverity, {
          schema_name: resolution.canonicalName,
          available_tabs: workbook.sheetNames(),
        })
      );
      log.warn("Tab skipped: worksheet missing", { tabName });
      continue;
    }

    try {
      const result = extractTab(worksheet, resolution.schema, options);
      setEntry(tabContents, tabName, { ...result.extractedData });
      validationResults.push(...result.validationResults);
      tabResults.push(result);
      options.stats?.incrementProcessed({ tabs: 1 });
    } catch (error) {
      validationResults.push(
        failed("tab_extraction", `Extraction of tab '${tabName}' failed: ${toErrorMessage(error)}`, tabName, "ERROR", {
          code: ErrorCodes.DATA_EXTRACTION_FAILED,
          schema_name: resolution.canonicalName,
        })
      );
      log.error("Tab extraction failed", { tabName, error: toErrorMessage(error) });
    }
  }

  return { tabContents, schemas, validationResults, tabResults };
}
