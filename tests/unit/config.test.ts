import { describe, it, expect } from "vitest";
import { excelConfigFromEnv, parseEnv } from "../../server/config/env";
import {
  DEFAULT_PROCESSING_CONFIG,
  PERFORMANCE_PROCESSING_CONFIG,
  STRICT_PROCESSING_CONFIG,
  configToDict,
  createExcelParseConfig,
  createKeyValueExtractConfig,
  createTabExtractConfig,
  describeParseConfig,
} from "../../server/config/excelConfig";
import { ConfigurationError } from "../../server/utils/errors";

describe("processing configuration", () => {
  it("fills in defaults", () => {
    const parse = DEFAULT_PROCESSING_CONFIG.parse;
    expect(parse.maxFileSizeMb).toBe(100);
    expect(parse.allowedExtensions).toEqual([".xlsx", ".xls"]);
    expect(parse.strictMode).toBe(false);
    expect(parse.skipInvalidTabs).toBe(true);
    expect(DEFAULT_PROCESSING_CONFIG.keyValue.maxRows).toBe(1000);
    expect(DEFAULT_PROCESSING_CONFIG.tab.handleMissingValues).toBe("skip");
  });

  it("lower-cases allowed extensions", () => {
    expect(createExcelParseConfig({ allowedExtensions: [".XLSX"] }).allowedExtensions).toEqual([".xlsx"]);
  });

  it("rejects out-of-range values with a configuration error", () => {
    expect(() => createExcelParseConfig({ maxFileSizeMb: 0 })).toThrow(ConfigurationError);
    expect(() => createExcelParseConfig({ maxFileSizeMb: -5 })).toThrow("Invalid ExcelParseConfig: maxFileSizeMb: maxFileSizeMb must be positive");
    expect(() => createExcelParseConfig({ allowedExtensions: [] })).toThrow("allowedExtensions cannot be empty");
    expect(() => createKeyValueExtractConfig({ maxColumns: 27 })).toThrow("maxColumns must be between 1 and 26");
    expect(() => createTabExtractConfig({ maxFieldCount: 0 })).toThrow("maxFieldCount must be positive");
  });

  it("freezes what it builds", () => {
    expect(Object.isFrozen(DEFAULT_PROCESSING_CONFIG.parse)).toBe(true);
  });

  it("offers strict and performance presets", () => {
    expect(STRICT_PROCESSING_CONFIG.parse.strictMode).toBe(true);
    expect(STRICT_PROCESSING_CONFIG.parse.skipInvalidTabs).toBe(false);
    expect(STRICT_PROCESSING_CONFIG.tab.handleMissingValues).toBe("error");
    expect(PERFORMANCE_PROCESSING_CONFIG.parse.maxFileSizeMb).toBe(500);
    expect(PERFORMANCE_PROCESSING_CONFIG.tab.validateSchemas).toBe(false);
  });

  it("describes the parse options", () => {
    expect(describeParseConfig(DEFAULT_PROCESSING_CONFIG.parse)).toBe(
      "File validation: enabled, Format validation: enabled, Max file size: 100MB, Strict mode: disabled"
    );
  });

  it("projects to snake_case keys", () => {
    const dict = configToDict(DEFAULT_PROCESSING_CONFIG);
    expect(dict.parse.max_file_size_mb).toBe(100);
    expect(dict.key_value.max_columns).toBe(26);
    expect(dict.tab.handle_missing_values).toBe("skip");
  });
});

describe("environment configuration", () => {
  it("parses EXCEL_* overrides", () => {
    const env = parseEnv({ NODE_ENV: "test", EXCEL_MAX_FILE_SIZE_MB: "25", EXCEL_STRICT_MODE: "1" });
    expect(env.EXCEL_MAX_FILE_SIZE_MB).toBe(25);
    expect(env.EXCEL_STRICT_MODE).toBe(true);
  });

  it("rejects malformed values", () => {
    expect(() => parseEnv({ EXCEL_MAX_TABS: "many" })).toThrow(ConfigurationError);
    expect(() => parseEnv({ EXCEL_STRICT_MODE: "yes" })).toThrow("EXCEL_STRICT_MODE");
  });

  it("layers overrides onto a base configuration", () => {
    const config = excelConfigFromEnv({ EXCEL_MAX_TABS: "5", EXCEL_STRICT_MODE: "false" }, { parse: { maxFileSizeMb: 10 } });
    expect(config.parse.maxTabs).toBe(5);
    expect(config.parse.maxFileSizeMb).toBe(10);
    expect(config.parse.strictMode).toBe(false);
  });
});
