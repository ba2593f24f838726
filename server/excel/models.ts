import { ErrorCodes, ValidationError } from "../utils/errors";
import type { CellValue, WorkbookProperties } from "./types";
import { setEntry } from "./records";

export const SEVERITIES = ["ERROR", "WARNING", "INFO"] as const;
export type Severity = (typeof SEVERITIES)[number];

const isSeverity = (value: string): value is Severity => SEVERITIES.some(s => s === value);

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Dates become ISO strings, nested containers are expanded. */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === "object") {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, inner] of Object.entries(value)) {
      setEntry(out, key, toJsonValue(inner));
    }
    return out;
  }
  return String(value);
}

function recordToJson(record: Readonly<Record<string, unknown>>): Record<string, JsonValue> {
  const out: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(record)) {
    setEntry(out, key, toJsonValue(value));
  }
  return out;
}

export interface ValidationResultInit {
  fieldName: string;
  isValid: boolean;
  message: string;
  severity: string;
  location: string;
  context?: Record<string, unknown>;
  timestamp?: Date;
}

export class ValidationResult {
  readonly fieldName: string;
  readonly isValid: boolean;
  readonly message: string;
  readonly severity: Severity;
  readonly location: string;
  readonly context: Readonly<Record<string, unknown>>;
  readonly timestamp: Date;

  constructor(init: ValidationResultInit) {
    const severity = init.severity.toUpperCase();
    if (!isSeverity(severity)) {
      throw new ValidationError(
        `Invalid severity: ${init.severity}. Must be one of ${SEVERITIES.join(", ")}`,
        ErrorCodes.FIELD_VALUE_INVALID,
        { severity: init.severity }
      );
    }
    this.fieldName = init.fieldName;
    this.isValid = init.isValid;
    this.message = init.message;
    this.severity = severity;
    this.location = init.location;
    this.context = Object.freeze({ ...init.context });
    this.timestamp = init.timestamp ?? new Date();
    Object.freeze(this);
  }

  isError(): boolean {
    return this.severity === "ERROR";
  }

  isWarning(): boolean {
    return this.severity === "WARNING";
  }

  isInfo(): boolean {
    return this.severity === "INFO";
  }

  getSummary(): string {
    const status = this.isValid ? "✓ PASS" : "✗ FAIL";
    return `${status} ${this.fieldName} at ${this.location}: ${this.message}`;
  }

  toDict(): Record<string, JsonValue> {
    return {
      field_name: this.fieldName,
      is_valid: this.isValid,
      message: this.message,
      severity: this.severity,
      location: this.location,
      context: recordToJson(this.context),
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export const passed = (fieldName: string, message: string, location: string, context?: Record<string, unknown>) =>
  new ValidationResult({ fieldName, isValid: true, message, severity: "INFO", location, context });

export const failed = (
  fieldName: string,
  message: string,
  location: string,
  severity: Severity = "ERROR",
  context?: Record<string, unknown>
) => new ValidationResult({ fieldName, isValid: false, message, severity, location, context });

export const errorMessagesOf = (results: readonly ValidationResult[]): string[] =>
  results.filter(r => !r.isValid && r.isError()).map(r => r.message);

export const warningMessagesOf = (results: readonly ValidationResult[]): string[] =>
  results.filter(r => !r.isValid && r.isWarning()).map(r => r.message);

export const hasErrors = (results: readonly ValidationResult[]): boolean =>
  results.some(r => !r.isValid && r.isError());

function validationSummary(results: readonly ValidationResult[]): string {
  const passedCount = results.filter(r => r.isValid).length;
  return `${passedCount}/${results.length} validations passed`;
}

function listSummary(items: readonly string[], noun: string): string {
  if (items.length === 0) return `No ${noun}`;
  return `${items.length} ${noun}: ${items.join("; ")}`;
}

export type ErrorKind = "validation" | "processing" | "warning";

export class ProcessingStats {
  startTime = 0;
  endTime = 0;
  rowsProcessed = 0;
  cellsProcessed = 0;
  tabsProcessed = 0;
  fieldsProcessed = 0;
  validationErrors = 0;
  processingErrors = 0;
  warnings = 0;

  startTiming(at: number = Date.now()): void {
    this.startTime = at;
  }

  endTiming(at: number = Date.now()): void {
    this.endTime = at;
  }

  incrementProcessed(counts: { rows?: number; cells?: number; tabs?: number; fields?: number }): void {
    this.rowsProcessed += counts.rows ?? 0;
    this.cellsProcessed += counts.cells ?? 0;
    this.tabsProcessed += counts.tabs ?? 0;
    this.fieldsProcessed += counts.fields ?? 0;
  }

  recordError(kind: ErrorKind): void {
    switch (kind) {
      case "validation":
        this.validationErrors += 1;
        break;
      case "processing":
        this.processingErrors += 1;
        break;
      case "warning":
        this.warnings += 1;
        break;
    }
  }

  /** Seconds between startTiming and endTiming. */
  get totalTime(): number {
    return this.endTime > this.startTime ? (this.endTime - this.startTime) / 1000 : 0;
  }

  get cellsPerSecond(): number {
    return this.totalTime > 0 ? this.cellsProcessed / this.totalTime : 0;
  }

  get rowsPerSecond(): number {
    return this.totalTime > 0 ? this.rowsProcessed / this.totalTime : 0;
  }

  get totalErrors(): number {
    return this.validationErrors + this.processingErrors;
  }

  get successRate(): number {
    const operations = this.cellsProcessed + this.fieldsProcessed;
    if (operations === 0) return 1;
    return (operations - this.totalErrors) / operations;
  }

  getSummary(): Record<string, number> {
    return {
      total_time_seconds: this.totalTime,
      rows_processed: this.rowsProcessed,
      cells_processed: this.cellsProcessed,
      tabs_processed: this.tabsProcessed,
      fields_processed: this.fieldsProcessed,
      validation_errors: this.validationErrors,
      processing_errors: this.processingErrors,
      warnings: this.warnings,
      total_errors: this.totalErrors,
      success_rate: this.successRate,
      cells_per_second: this.cellsPerSecond,
      rows_per_second: this.rowsPerSecond,
    };
  }

  toDict(): Record<string, JsonValue> {
    return {
      start_time: this.startTime,
      end_time: this.endTime,
      rows_processed: this.rowsProcessed,
      cells_processed: this.cellsProcessed,
      tabs_processed: this.tabsProcessed,
      fields_processed: this.fieldsProcessed,
      validation_errors: this.validationErrors,
      processing_errors: this.processingErrors,
      warnings: this.warnings,
      total_time: this.totalTime,
      success_rate: this.successRate,
    };
  }
}

export interface KeyValueExtractResultInit {
  success: boolean;
  extractedPairs: Record<string, CellValue>;
  rowsScanned: number;
  truncated: boolean;
  validationResults: ValidationResult[];
}

export class KeyValueExtractResult {
  readonly success: boolean;
  readonly extractedPairs: Readonly<Record<string, CellValue>>;
  readonly rowsScanned: number;
  readonly truncated: boolean;
  readonly validationResults: readonly ValidationResult[];
  readonly errors: readonly string[];
  readonly warnings: readonly string[];

  constructor(init: KeyValueExtractResultInit) {
    this.success = init.success;
    this.extractedPairs = Object.freeze({ ...init.extractedPairs });
    this.rowsScanned = init.rowsScanned;
    this.truncated = init.truncated;
    this.validationResults = Object.freeze([...init.validationResults]);
    this.errors = Object.freeze(errorMessagesOf(init.validationResults));
    this.warnings = Object.freeze(warningMessagesOf(init.validationResults));
  }

  isValid(): boolean {
    return this.success && this.errors.length === 0;
  }

  get pairsCount(): number {
    return Object.keys(this.extractedPairs).length;
  }

  getErrorSummary(): string {
    return listSummary(this.errors, "errors");
  }

  toDict(): Record<string, JsonValue> {
    return {
      success: this.success,
      extracted_pairs: recordToJson(this.extractedPairs),
      rows_scanned: this.rowsScanned,
      truncated: this.truncated,
      validation_results: this.validationResults.map(r => r.toDict()),
      errors: [...this.errors],
      warnings: [...this.warnings],
      pairs_count: this.pairsCount,
    };
  }
}

export interface TabExtractResultInit {
  tabName: string;
  schemaName: string;
  success: boolean;
  extractedData: Record<string, CellValue>;
  validationResults: ValidationResult[];
}

export class TabExtractResult {
  readonly tabName: string;
  readonly schemaName: string;
  readonly success: boolean;
  readonly extractedData: Readonly<Record<string, CellValue>>;
  readonly validationResults: readonly ValidationResult[];
  readonly errors: readonly string[];
  readonly warnings: readonly string[];

  constructor(init: TabExtractResultInit) {
    this.tabName = init.tabName;
    this.schemaName = init.schemaName;
    this.success = init.success;
    this.extractedData = Object.freeze({ ...init.extractedData });
    this.validationResults = Object.freeze([...init.validationResults]);
    this.errors = Object.freeze(errorMessagesOf(init.validationResults));
    this.warnings = Object.freeze(warningMessagesOf(init.validationResults));
  }

  isValid(): boolean {
    return this.success && this.errors.length === 0;
  }

  getErrorSummary(): string {
    return listSummary(this.errors, "errors");
  }

  getValidationSummary(): string {
    return validationSummary(this.validationResults);
  }

  toDict(): Record<string, JsonValue> {
    return {
      tab_name: this.tabName,
      schema_name: this.schemaName,
      success: this.success,
      extracted_data: recordToJson(this.extractedData),
      validation_results: this.validationResults.map(r => r.toDict()),
      errors: [...this.errors],
      warnings: [...this.warnings],
    };
  }
}

export interface ExcelParseResultInit {
  success: boolean;
  metadata: Record<string, CellValue>;
  schemas: Record<string, string>;
  tabContents: Record<string, Record<string, CellValue>>;
  validationResults: ValidationResult[];
  processingStats: ProcessingStats;
  filePath: string;
  processingTime: number;
  workbookProperties?: WorkbookProperties;
  fatalError?: string;
  timestamp?: Date;
}

export class ExcelParseResult {
  readonly success: boolean;
  readonly metadata: Readonly<Record<string, CellValue>>;
  readonly schemas: Readonly<Record<string, string>>;
  readonly tabContents: Readonly<Record<string, Readonly<Record<string, CellValue>>>>;
  readonly validationResults: readonly ValidationResult[];
  readonly processingStats: ProcessingStats;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  readonly filePath: string;
  /** Seconds. */
  readonly processingTime: number;
  readonly workbookProperties: Readonly<WorkbookProperties>;
  readonly timestamp: Date;

  constructor(init: ExcelParseResultInit) {
    const errors = errorMessagesOf(init.validationResults);
    if (init.fatalError !== undefined && !errors.includes(init.fatalError)) {
      errors.unshift(init.fatalError);
    }
    this.success = init.success;
    this.metadata = Object.freeze({ ...init.metadata });
    this.schemas = Object.freeze({ ...init.schemas });
    const tabs: Record<string, Readonly<Record<string, CellValue>>> = {};
    for (const [tab, data] of Object.entries(init.tabContents)) {
      setEntry(tabs, tab, Object.freeze({ ...data }));
    }
    this.tabContents = Object.freeze(tabs);
    this.validationResults = Object.freeze([...init.validationResults]);
    this.processingStats = init.processingStats;
    this.errors = Object.freeze(errors);
    this.warnings = Object.freeze(warningMessagesOf(init.validationResults));
    this.filePath = init.filePath;
    this.processingTime = init.processingTime;
    this.workbookProperties = Object.freeze({ ...init.workbookProperties });
    this.timestamp = init.timestamp ?? new Date();
  }

  isValid(): boolean {
    return this.success && this.errors.length === 0;
  }

  getErrorSummary(): string {
    return listSummary(this.errors, "errors");
  }

  getWarningSummary(): string {
    return listSummary(this.warnings, "warnings");
  }

  getValidationSummary(): string {
    return validationSummary(this.validationResults);
  }

  getProcessingSummary(): string {
    const stats = this.processingStats;
    return (
      `Processed ${stats.tabsProcessed} tabs, ${stats.rowsProcessed} rows, ` +
      `${stats.cellsProcessed} cells in ${stats.totalTime.toFixed(2)}s ` +
      `(${stats.cellsPerSecond.toFixed(1)} cells/s)`
    );
  }

  toDict(): Record<string, JsonValue> {
    const tabContents: Record<string, JsonValue> = {};
    for (const [tab, data] of Object.entries(this.tabContents)) {
      setEntry(tabContents, tab, recordToJson(data));
    }
    return {
      success: this.success,
      metadata: recordToJson(this.metadata),
      schemas: recordToJson(this.schemas),
      tab_contents: tabContents,
      validation_results: this.validationResults.map(r => r.toDict()),
      processing_stats: this.processingStats.toDict(),
      errors: [...this.errors],
      warnings: [...this.warnings],
      file_path: this.filePath,
      processing_time: this.processingTime,
      workbook_properties: recordToJson({
        title: this.workbookProperties.title,
        creator: this.workbookProperties.creator,
        created: this.workbookProperties.created,
        modified: this.workbookProperties.modified,
        last_modified_by: this.workbookProperties.lastModifiedBy,
      }),
      timestamp: this.timestamp.toISOString(),
    };
  }
}
