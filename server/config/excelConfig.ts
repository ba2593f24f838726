import { z } from "zod";
import { ConfigurationError } from "../utils/errors";

export const MISSING_VALUE_POLICIES = ["skip", "null", "error"] as const;
export type MissingValuePolicy = (typeof MISSING_VALUE_POLICIES)[number];

const positiveInt = (name: string) =>
  z.number({ invalid_type_error: `${name} must be a number` }).int(`${name} must be an integer`).positive(`${name} must be positive`);

export const excelParseConfigSchema = z.object({
  validateFileExists: z.boolean().default(true),
  validateFileFormat: z.boolean().default(true),
  maxFileSizeMb: z.number().positive("maxFileSizeMb must be positive").default(100),
  allowedExtensions: z
    .array(z.string().regex(/^\.[A-Za-z0-9]+$/, "extensions must look like '.xlsx'"))
    .min(1, "allowedExtensions cannot be empty")
    .transform(exts => exts.map(ext => ext.toLowerCase()))
    .default([".xlsx", ".xls"]),
  strictMode: z.boolean().default(false),
  skipInvalidTabs: z.boolean().default(true),
  maxTabs: positiveInt("maxTabs").default(50),
  enableMetrics: z.boolean().default(true),
  detailedLogging: z.boolean().default(false),
});

export const keyValueExtractConfigSchema = z.object({
  maxRows: positiveInt("maxRows").default(1000),
  maxColumns: positiveInt("maxColumns").max(26, "maxColumns must be between 1 and 26").default(26),
  validateCellReferences: z.boolean().default(true),
  trimWhitespace: z.boolean().default(true),
  logValidationWarnings: z.boolean().default(true),
});

export const tabExtractConfigSchema = z.object({
  validateSchemas: z.boolean().default(true),
  maxFieldCount: positiveInt("maxFieldCount").default(1000),
  typeConversionStrict: z.boolean().default(false),
  trimStrings: z.boolean().default(true),
  handleMissingValues: z.enum(MISSING_VALUE_POLICIES).default("skip"),
});

export type ExcelParseConfig = Readonly<z.infer<typeof excelParseConfigSchema>>;
export type KeyValueExtractConfig = Readonly<z.infer<typeof keyValueExtractConfigSchema>>;
export type TabExtractConfig = Readonly<z.infer<typeof tabExtractConfigSchema>>;

export type ExcelParseConfigInput = z.input<typeof excelParseConfigSchema>;
export type KeyValueExtractConfigInput = z.input<typeof keyValueExtractConfigSchema>;
export type TabExtractConfigInput = z.input<typeof tabExtractConfigSchema>;

export interface ExcelProcessingConfig {
  readonly parse: ExcelParseConfig;
  readonly keyValue: KeyValueExtractConfig;
  readonly tab: TabExtractConfig;
}

export interface ExcelProcessingConfigInput {
  parse?: ExcelParseConfigInput;
  keyValue?: KeyValueExtractConfigInput;
  tab?: TabExtractConfigInput;
}

function build<S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): Readonly<z.infer<S>> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new ConfigurationError(
      `Invalid ${label}: ${issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ")}`,
      { config: label, issues }
    );
  }
  return Object.freeze(result.data);
}

export function createExcelParseConfig(input: ExcelParseConfigInput = {}): ExcelParseConfig {
  return build(excelParseConfigSchema, input, "ExcelParseConfig");
}

export function createKeyValueExtractConfig(input: KeyValueExtractConfigInput = {}): KeyValueExtractConfig {
  return build(keyValueExtractConfigSchema, input, "KeyValueExtractConfig");
}

export function createTabExtractConfig(input: TabExtractConfigInput = {}): TabExtractConfig {
  return build(tabExtractConfigSchema, input, "TabExtractConfig");
}

export function createProcessingConfig(input: ExcelProcessingConfigInput = {}): ExcelProcessingConfig {
  return Object.freeze({
    parse: createExcelParseConfig(input.parse),
    keyValue: createKeyValueExtractConfig(input.keyValue),
    tab: createTabExtractConfig(input.tab),
  });
}

export const DEFAULT_PROCESSING_CONFIG = createProcessingConfig();

export const STRICT_PROCESSING_CONFIG = createProcessingConfig({
  parse: { strictMode: true, detailedLogging: true, skipInvalidTabs: false },
  keyValue: { validateCellReferences: true, logValidationWarnings: true },
  tab: { validateSchemas: true, typeConversionStrict: true, handleMissingValues: "error" },
});

export const PERFORMANCE_PROCESSING_CONFIG = createProcessingConfig({
  parse: { maxFileSizeMb: 500, maxTabs: 100, enableMetrics: true, detailedLogging: false },
  tab: { validateSchemas: false },
});

export function describeParseConfig(config: ExcelParseConfig): string {
  const onOff = (flag: boolean) => (flag ? "enabled" : "disabled");
  return (
    `File validation: ${onOff(config.validateFileExists)}, ` +
    `Format validation: ${onOff(config.validateFileFormat)}, ` +
    `Max file size: ${config.maxFileSizeMb}MB, ` +
    `Strict mode: ${onOff(config.strictMode)}`
  );
}

export function configToDict(config: ExcelProcessingConfig): Record<string, Record<string, unknown>> {
  const { parse, keyValue, tab } = config;
  return {
    parse: {
      validate_file_exists: parse.validateFileExists,
      validate_file_format: parse.validateFileFormat,
      max_file_size_mb: parse.maxFileSizeMb,
      allowed_extensions: [...parse.allowedExtensions],
      strict_mode: parse.strictMode,
      skip_invalid_tabs: parse.skipInvalidTabs,
      max_tabs: parse.maxTabs,
      enable_metrics: parse.enableMetrics,
      detailed_logging: parse.detailedLogging,
    },
    key_value: {
      max_rows: keyValue.maxRows,
      max_columns: keyValue.maxColumns,
      validate_cell_references: keyValue.validateCellReferences,
      trim_whitespace: keyValue.trimWhitespace,
      log_validation_warnings: keyValue.logValidationWarnings,
    },
    tab: {
      validate_schemas: tab.validateSchemas,
      max_field_count: tab.maxFieldCount,
      type_conversion_strict: tab.typeConversionStrict,
      trim_strings: tab.trimStrings,
      handle_missing_values: tab.handleMissingValues,
    },
  };
}
