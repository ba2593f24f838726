import { describe, it, expect } from "vitest";
import {
  ExcelParseResult,
  ProcessingStats,
  ValidationResult,
  failed,
  hasErrors,
  passed,
} from "../../server/excel/models";
import { ValidationError } from "../../server/utils/errors";

describe("ValidationResult", () => {
  it("upper-cases the severity", () => {
    const result = new ValidationResult({ fieldName: "f", isValid: false, message: "m", severity: "warning", location: "A1" });
    expect(result.severity).toBe("WARNING");
    expect(result.isWarning()).toBe(true);
    expect(result.isError()).toBe(false);
  });

  it("rejects unknown severities", () => {
    expect(() => new ValidationResult({ fieldName: "f", isValid: false, message: "m", severity: "fatal", location: "A1" })).toThrow(
      ValidationError
    );
  });

  it("is immutable", () => {
    const result = passed("f", "ok", "A1", { n: 1 });
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.context)).toBe(true);
  });

  it("summarises itself on one line", () => {
    expect(passed("facility_name", "present", "Form!$D$16").getSummary()).toBe("✓ PASS facility_name at Form!$D$16: present");
    expect(failed("file_size", "too big", "big.xlsx").getSummary()).toBe("✗ FAIL file_size at big.xlsx: too big");
  });

  it("projects to a plain dictionary", () => {
    const timestamp = new Date(Date.UTC(2024, 4, 1, 12));
    const result = new ValidationResult({
      fieldName: "inspection_timestamp",
      isValid: false,
      message: "bad date",
      severity: "ERROR",
      location: "Form!$D$19",
      context: { value: new Date(Date.UTC(2024, 0, 1)), tried: ["a", "b"] },
      timestamp,
    });
    expect(result.toDict()).toEqual({
      field_name: "inspection_timestamp",
      is_valid: false,
      message: "bad date",
      severity: "ERROR",
      location: "Form!$D$19",
      context: { value: "2024-01-01T00:00:00.000Z", tried: ["a", "b"] },
      timestamp: "2024-05-01T12:00:00.000Z",
    });
  });

  it("counts only failed ERROR results as errors", () => {
    expect(hasErrors([passed("a", "ok", "x"), failed("b", "warn", "x", "WARNING")])).toBe(false);
    expect(hasErrors([failed("c", "bad", "x")])).toBe(true);
  });
});

describe("ProcessingStats", () => {
  it("derives rates and totals from its counters", () => {
    const stats = new ProcessingStats();
    stats.startTiming(1000);
    stats.incrementProcessed({ rows: 4, cells: 10, fields: 5, tabs: 1 });
    stats.recordError("validation");
    stats.recordError("validation");
    stats.recordError("processing");
    stats.recordError("warning");
    stats.endTiming(3000);

    expect(stats.totalTime).toBe(2);
    expect(stats.cellsPerSecond).toBe(5);
    expect(stats.rowsPerSecond).toBe(2);
    expect(stats.totalErrors).toBe(3);
    expect(stats.warnings).toBe(1);
    expect(stats.successRate).toBeCloseTo(0.8);
  });

  it("reports zero rates before timing ends", () => {
    const stats = new ProcessingStats();
    stats.startTiming(5000);
    expect(stats.totalTime).toBe(0);
    expect(stats.cellsPerSecond).toBe(0);
    expect(stats.successRate).toBe(1);
  });
});

describe("ExcelParseResult", () => {
  const build = (fatalError?: string) =>
    new ExcelParseResult({
      success: fatalError === undefined,
      metadata: { version: "v01" },
      schemas: { "Feedback Form": "landfill_v01_00" },
      tabContents: { "Feedback Form": { id_incidence: 7 } },
      validationResults: [
        passed("file_path", "ok", "f.xlsx"),
        failed("repair_completed", "Cannot convert 'maybe' to boolean", "Form!$D$22"),
        failed("contact_email", "looks odd", "Form!$D$17", "WARNING"),
      ],
      processingStats: new ProcessingStats(),
      filePath: "f.xlsx",
      processingTime: 0,
      fatalError,
    });

  it("separates error and warning messages", () => {
    const result = build();
    expect(result.errors).toEqual(["Cannot convert 'maybe' to boolean"]);
    expect(result.warnings).toEqual(["looks odd"]);
    expect(result.getWarningSummary()).toBe("1 warnings: looks odd");
    expect(result.getValidationSummary()).toBe("1/3 validations passed");
    expect(result.isValid()).toBe(false);
  });

  it("puts a fatal error at the head of the error list", () => {
    const result = build("Failed to load workbook");
    expect(result.errors).toEqual(["Failed to load workbook", "Cannot convert 'maybe' to boolean"]);
    expect(result.getErrorSummary()).toBe("2 errors: Failed to load workbook; Cannot convert 'maybe' to boolean");
  });

  it("freezes the extracted content", () => {
    const result = build();
    expect(Object.isFrozen(result.tabContents["Feedback Form"])).toBe(true);
    expect(result.toDict().tab_contents).toEqual({ "Feedback Form": { id_incidence: 7 } });
  });
});
