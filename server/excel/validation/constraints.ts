import { ErrorCodes, toErrorMessage } from "../../utils/errors";
import { ValidationResult, failed, passed } from "../models";
import type { CellValue, FieldConstraints } from "../types";

export const FORMAT_PATTERNS = {
  email: /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/,
  phone: /^[+]?[1-9]\d{0,15}$/,
  url: /^https?:\/\/(www\.)?[-a-zA-Z0-9@:%._+~#=]{1,256}\.[a-zA-Z0-9()]{1,6}\b([-a-zA-Z0-9()@:%_+.~#?&/=]*)$/,
  zip_code: /^\d{5}(-\d{4})?$/,
  ssn: /^\d{3}-\d{2}-\d{4}$/,
  credit_card: /^\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}$/,
} as const;

export type FormatType = keyof typeof FORMAT_PATTERNS;

export const isFormatType = (value: string): value is FormatType =>
  Object.prototype.hasOwnProperty.call(FORMAT_PATTERNS, value);

const UNICODE_NOISE = {
  loneSurrogates: /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g,
  controlChars: /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g,
};

/** Replaces unpaired surrogates with U+FFFD, drops control characters other than tab/newline/CR, then NFC. */
export function sanitizeUnicode(text: string): string {
  return text
    .replace(UNICODE_NOISE.loneSurrogates, "\uFFFD")
    .replace(UNICODE_NOISE.controlChars, "")
    .normalize("NFC");
}

export interface ConstraintViolation {
  constraint: keyof FieldConstraints;
  value: CellValue;
  limit?: number;
  pattern?: string;
  allowedValues?: readonly CellValue[];
  message: string;
}

const describe = (value: CellValue): string => (value instanceof Date ? value.toISOString() : String(value));

const sameValue = (a: CellValue, b: CellValue): boolean =>
  a instanceof Date && b instanceof Date ? a.getTime() === b.getTime() : a === b;

/** Anchored at the start only, like a prefix match. */
function compilePattern(pattern: string): RegExp | Error {
  try {
    return new RegExp(`^(?:${pattern})`);
  } catch (error) {
    return error instanceof Error ? error : new Error(toErrorMessage(error));
  }
}

function constraintsToContext(constraints: FieldConstraints): Record<string, unknown> {
  const { customValidator, ...rest } = constraints;
  return customValidator ? { ...rest, customValidator: true } : rest;
}

export function collectViolations(value: CellValue, constraints: FieldConstraints): ConstraintViolation[] {
  const violations: ConstraintViolation[] = [];

  if (typeof value === "number") {
    if (constraints.minValue !== undefined && value < constraints.minValue) {
      violations.push({
        constraint: "minValue",
        value,
        limit: constraints.minValue,
        message: `Value ${value} is less than minimum ${constraints.minValue}`,
      });
    }
    if (constraints.maxValue !== undefined && value > constraints.maxValue) {
      violations.push({
        constraint: "maxValue",
        value,
        limit: constraints.maxValue,
        message: `Value ${value} is greater than maximum ${constraints.maxValue}`,
      });
    }
  }

  if (typeof value === "string") {
    if (constraints.minLength !== undefined && value.length < constraints.minLength) {
      violations.push({
        constraint: "minLength",
        value: value.length,
        limit: constraints.minLength,
        message: `String length ${value.length} is less than minimum ${constraints.minLength}`,
      });
    }
    if (constraints.maxLength !== undefined && value.length > constraints.maxLength) {
      violations.push({
        constraint: "maxLength",
        value: value.length,
        limit: constraints.maxLength,
        message: `String length ${value.length} is greater than maximum ${constraints.maxLength}`,
      });
    }
    if (constraints.pattern !== undefined) {
      const compiled = compilePattern(constraints.pattern);
      if (compiled instanceof Error) {
        violations.push({
          constraint: "pattern",
          value,
          pattern: constraints.pattern,
          message: `Invalid pattern '${constraints.pattern}': ${compiled.message}`,
        });
      } else if (!compiled.test(value)) {
        violations.push({
          constraint: "pattern",
          value,
          pattern: constraints.pattern,
          message: `Value '${value}' does not match pattern '${constraints.pattern}'`,
        });
      }
    }
  }

  if (constraints.enum !== undefined && !constraints.enum.some(allowed => sameValue(allowed, value))) {
    violations.push({
      constraint: "enum",
      value,
      allowedValues: constraints.enum,
      message: `Value '${describe(value)}' is not in allowed values: ${constraints.enum.map(describe).join(", ")}`,
    });
  }

  if (constraints.customValidator) {
    try {
      if (!constraints.customValidator(value)) {
        violations.push({ constraint: "customValidator", value, message: "Custom validation function returned false" });
      }
    } catch (error) {
      violations.push({
        constraint: "customValidator",
        value,
        message: `Custom validation function error: ${toErrorMessage(error)}`,
      });
    }
  }

  return violations;
}

/** Checks every constraint and folds all violations into a single result. */
export function validateFieldConstraints(
  value: CellValue,
  constraints: FieldConstraints | undefined,
  fieldName = "field_constraints",
  location = "value"
): ValidationResult {
  if (!constraints || Object.keys(constraints).length === 0) {
    return passed(fieldName, "No constraints specified", location);
  }

  const violations = collectViolations(value, constraints);
  if (violations.length > 0) {
    return failed(fieldName, `Field constraint validation failed: ${violations.length} violations`, location, "ERROR", {
      code: ErrorCodes.FIELD_CONSTRAINT_VIOLATION,
      validation_errors: violations,
      constraints: constraintsToContext(constraints),
    });
  }
  return passed(fieldName, "All field constraints are satisfied", location, {
    constraints: constraintsToContext(constraints),
  });
}

export function validateDataFormat(
  value: CellValue,
  formatType: string,
  fieldName = "data_format",
  location = "value"
): ValidationResult {
  if (typeof value !== "string") {
    return failed(fieldName, `Format validation requires string value, got ${value === null ? "null" : typeof value}`, location, "ERROR", {
      value,
      format_type: formatType,
    });
  }
  if (!isFormatType(formatType)) {
    return failed(fieldName, `Unknown format type: ${formatType}`, location, "ERROR", {
      format_type: formatType,
      available_formats: Object.keys(FORMAT_PATTERNS),
    });
  }
  const pattern = FORMAT_PATTERNS[formatType];
  if (pattern.test(value)) {
    return passed(fieldName, `Value matches ${formatType} format`, location, { format_type: formatType, pattern: pattern.source });
  }
  return failed(fieldName, `Value does not match ${formatType} format`, location, "ERROR", {
    format_type: formatType,
    pattern: pattern.source,
    value,
  });
}
