import { DEFAULT_PROCESSING_CONFIG, type ExcelProcessingConfig } from "../config/excelConfig";
import { ErrorCodes, ProcessingError, isExcelProcessingError, toErrorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { createContext, runWithContext } from "../utils/processingContext";
import { ExcelParseResult, ProcessingStats, ValidationResult, failed, hasErrors } from "./models";
import { hasEntry, setEntry } from "./records";
import { resolveSchema } from "./schemaResolver";
import { createSchemaRegistry, getDefaultSchemaRegistry, schemaFromDefinition } from "./schemaRegistry";
import { PLEASE_SELECT, extractTab } from "./tabExtractor";
import type {
  BusinessRule,
  CellValue,
  ExtractedRecord,
  Schema,
  SchemaRegistry,
  WorkbookHandle,
  WorkbookProperties,
} from "./types";
import { sanitizeUnicode } from "./validation/constraints";
import { DataValidator, type ValidationMessages } from "./validation/dataValidator";
import { ExcelFileValidator } from "./validation/fileValidator";
import {
  validateCellReferences,
  validateDataTypes,
  validateSchemaCompatibility,
  validateSchemaDefinition,
} from "./validation/schemaValidator";
import { openWorkbook } from "./workbookHandle";
import { parseWorkbook } from "./workbookParser";

const log = createLogger("excelProcessor");

/** Schema definitions keyed by the tab they describe, in the list form `schemaFromDefinition` accepts. */
export type SuppliedSchemas = Readonly<Record<string, unknown>>;

export interface ExcelProcessorOptions {
  config?: ExcelProcessingConfig;
  /** Defaults to the bundled registry. */
  registry?: SchemaRegistry;
  messages?: Partial<ValidationMessages>;
}

export interface ProcessFileOptions {
  /** Business rules per tab name, evaluated against that tab's extracted record. */
  businessRules?: Readonly<Record<string, readonly BusinessRule[]>>;
  referenceDate?: Date;
}

export interface ProcessTabResult {
  data: ExtractedRecord;
  validationResults: ValidationResult[];
}

const PROCESSING_FAILURES = new Set(["workbook_loading", "tab_extraction", "processing"]);

export class ExcelProcessor {
  private readonly config: ExcelProcessingConfig;
  private readonly registry?: SchemaRegistry;
  private readonly fileValidator: ExcelFileValidator;
  private readonly dataValidator: DataValidator;

  constructor(options: ExcelProcessorOptions = {}) {
    this.config = options.config ?? DEFAULT_PROCESSING_CONFIG;
    this.registry = options.registry;
    this.fileValidator = new ExcelFileValidator(this.config.parse);
    this.dataValidator = new DataValidator(options.messages);
  }

  /**
   * Validates, opens, parses and checks one workbook. Every call owns its own stats and result
   * lists and runs under its own trace id.
   */
  processFile(
    filePath: string,
    requiredTabs: readonly string[] = [],
    schemas?: SuppliedSchemas,
    options: ProcessFileOptions = {}
  ): Promise<ExcelParseResult> {
    return runWithContext(createContext(filePath), () => this.run(filePath, requiredTabs, schemas, options));
  }

  /** Extracts one tab, by schema when given, otherwise every non-empty cell keyed by address. */
  processTab(workbook: WorkbookHandle, tabName: string, schema?: Schema): ProcessTabResult {
    const worksheet = workbook.sheet(tabName);
    if (!worksheet) {
      throw new ProcessingError(`Tab '${tabName}' not found in workbook`, ErrorCodes.SCHEMA_NOT_FOUND, {
        tabName,
        available_tabs: workbook.sheetNames(),
      });
    }

    if (schema) {
      const result = extractTab(worksheet, schema, { config: this.config.tab, detailedLogging: this.config.parse.detailedLogging });
      return { data: { ...result.extractedData }, validationResults: [...result.validationResults] };
    }

    const data: ExtractedRecord = {};
    for (const [address, value] of worksheet.cells()) {
      setEntry(data, address, typeof value === "string" ? sanitizeUnicode(value) : value);
    }
    return { data, validationResults: [] };
  }

  private async run(
    filePath: string,
    requiredTabs: readonly string[],
    schemas: SuppliedSchemas | undefined,
    options: ProcessFileOptions
  ): Promise<ExcelParseResult> {
    const strict = this.config.parse.strictMode;
    const stats = new ProcessingStats();
    stats.startTiming();
    const results: ValidationResult[] = [];
    log.info("Processing workbook", { filePath, strict });

    results.push(...(await this.fileValidator.validateFile(filePath)));
    if (strict && hasErrors(results)) {
      return this.finish(filePath, stats, results, { fatalError: "File validation failed" });
    }

    let workbook: WorkbookHandle;
    try {
      workbook = await openWorkbook(filePath);
    } catch (error) {
      if (!isExcelProcessingError(error)) throw error;
      results.push(failed("workbook_loading", `Failed to load workbook: ${error.message}`, filePath, "ERROR", { code: error.code }));
      return this.finish(filePath, stats, results, { fatalError: "Failed to load workbook" });
    }

    try {
      results.push(this.fileValidator.validateWorkbookStructure(workbook));
      results.push(this.fileValidator.validateRequiredTabs(workbook, requiredTabs));

      let registry: SchemaRegistry;
      let schemaMap: Record<string, string> | undefined;
      if (schemas) {
        const supplied = this.prepareSuppliedSchemas(schemas, workbook, results);
        if (strict && hasErrors(results)) {
          return this.finish(filePath, stats, results, {
            fatalError: "Schema validation failed",
            properties: workbook.properties,
          });
        }
        registry = supplied.registry;
        schemaMap = supplied.schemaMap;
      } else {
        registry = this.registry ?? getDefaultSchemaRegistry();
      }

      const parsed = parseWorkbook(workbook, registry, {
        config: this.config,
        stats,
        schemaMap,
        referenceDate: options.referenceDate,
      });
      results.push(...parsed.validationResults);

      const tabContents: Record<string, ExtractedRecord> = {};
      for (const [tab, data] of Object.entries(parsed.workbook?.tabContents ?? {})) {
        setEntry(tabContents, tab, { ...data });
      }
      for (const tabResult of parsed.tabResults) {
        const resolution = resolveSchema(tabResult.schemaName, registry);
        if (!resolution.found) continue;
        results.push(
          ...this.checkTabData(tabResult.tabName, resolution.schema, tabResult.extractedData, options.businessRules?.[tabResult.tabName])
        );
      }

      return this.finish(filePath, stats, results, {
        metadata: { ...parsed.workbook?.metadata },
        schemas: { ...parsed.workbook?.schemas },
        tabContents,
        properties: workbook.properties,
      });
    } catch (error) {
      log.error("Workbook processing failed", { filePath, error: toErrorMessage(error) });
      results.push(
        failed("processing", `Processing error: ${toErrorMessage(error)}`, filePath, "ERROR", {
          code: isExcelProcessingError(error) ? error.code : ErrorCodes.PROCESSING_FAILED,
        })
      );
      return this.finish(filePath, stats, results, { fatalError: `Processing error: ${toErrorMessage(error)}` });
    } finally {
      workbook.close();
    }
  }

  private prepareSuppliedSchemas(
    schemas: SuppliedSchemas,
    workbook: WorkbookHandle,
    results: ValidationResult[]
  ): { registry: SchemaRegistry; schemaMap: Record<string, string> } {
    const byName: Record<string, Schema> = {};
    const schemaMap: Record<string, string> = {};

    for (const [tabName, definition] of Object.entries(schemas)) {
      const structure = validateSchemaDefinition(definition);
      if (this.config.tab.validateSchemas || !structure.isValid) {
        results.push(structure);
      }
      if (!structure.isValid) continue;

      if (this.config.tab.validateSchemas) {
        results.push(validateCellReferences(definition, workbook));
        results.push(...validateDataTypes(definition));
      }

      try {
        const schema = schemaFromDefinition(definition);
        setEntry(byName, schema.schemaName, schema);
        setEntry(schemaMap, tabName, schema.schemaName);
      } catch (error) {
        results.push(failed("schema_validation", `Schema validation error: ${toErrorMessage(error)}`, `schema.${tabName}`));
      }
    }

    return { registry: createSchemaRegistry(byName), schemaMap };
  }

  private checkTabData(
    tabName: string,
    schema: Schema,
    data: Readonly<ExtractedRecord>,
    rules: readonly BusinessRule[] | undefined
  ): ValidationResult[] {
    const results: ValidationResult[] = [];

    const required = schema.fields.filter(field => field.required).map(field => field.name);
    if (required.length > 0) {
      const dropDowns = schema.fields.filter(field => field.isDropDown).map(field => field.name);
      results.push(this.dataValidator.validateRequiredFields(data, required, tabName, dropDowns));
    }

    for (const field of schema.fields) {
      if (!hasEntry(data, field.name)) continue;
      const value: CellValue = data[field.name];
      const location = `${tabName}!${field.valueAddress}`;
      if (field.constraints && Object.keys(field.constraints).length > 0) {
        results.push(this.dataValidator.validateFieldConstraints(value, field.constraints, field.name, location));
      }
      const blank = value === null || value === "" || (field.isDropDown && value === PLEASE_SELECT);
      if (field.format && !blank) {
        results.push(this.dataValidator.validateDataFormat(value, field.format, field.name, location));
      }
    }

    if (rules && rules.length > 0) {
      results.push(...this.dataValidator.validateBusinessRules(data, rules));
    }

    results.push(validateSchemaCompatibility(schema, data));
    return results;
  }

  private finish(
    filePath: string,
    stats: ProcessingStats,
    results: ValidationResult[],
    outcome: {
      fatalError?: string;
      metadata?: Record<string, CellValue>;
      schemas?: Record<string, string>;
      tabContents?: Record<string, ExtractedRecord>;
      properties?: WorkbookProperties;
    }
  ): ExcelParseResult {
    stats.endTiming();
    for (const result of results) {
      if (result.isValid) continue;
      if (result.isError()) stats.recordError(PROCESSING_FAILURES.has(result.fieldName) ? "processing" : "validation");
      else if (result.isWarning()) stats.recordError("warning");
    }

    const success = outcome.fatalError === undefined && (!hasErrors(results) || !this.config.parse.strictMode);
    const parseResult = new ExcelParseResult({
      success,
      metadata: outcome.metadata ?? {},
      schemas: outcome.schemas ?? {},
      tabContents: outcome.tabContents ?? {},
      validationResults: results,
      processingStats: stats,
      filePath,
      processingTime: stats.totalTime,
      workbookProperties: outcome.properties,
      fatalError: outcome.fatalError,
    });

    if (this.config.parse.enableMetrics) {
      log.info("Workbook processed", { filePath, success, ...stats.getSummary() });
    }
    if (!success) {
      log.warn("Workbook processing reported errors", { filePath, errors: parseResult.errors.length });
    }
    return parseResult;
  }
}

export function processFile(
  filePath: string,
  requiredTabs?: readonly string[],
  schemas?: SuppliedSchemas,
  options: ProcessFileOptions & ExcelProcessorOptions = {}
): Promise<ExcelParseResult> {
  return new ExcelProcessor(options).processFile(filePath, requiredTabs, schemas, options);
}

export function processTab(
  workbook: WorkbookHandle,
  tabName: string,
  schema?: Schema,
  options: ExcelProcessorOptions = {}
): ProcessTabResult {
  return new ExcelProcessor(options).processTab(workbook, tabName, schema);
}
