import { isValid, parse } from "date-fns";
import { ErrorCodes } from "../utils/errors";
import type { Severity } from "./models";
import type { CellValue, ValueType } from "./types";

export const DATETIME_FORMATS = ["yyyy-MM-dd", "MM/dd/yyyy", "dd/MM/yyyy", "yyyy-MM-dd HH:mm:ss"] as const;
export const TIME_FORMATS = ["HH:mm:ss", "HH:mm"] as const;

const TRUE_WORDS = new Set(["true", "1", "yes", "on"]);
const FALSE_WORDS = new Set(["false", "0", "no", "off"]);
const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export interface CoercionResult {
  value: CellValue;
  isValid: boolean;
  message: string;
  severity: Severity;
  context: Record<string, unknown>;
}

export interface CoercionOptions {
  /** Rejects lossy conversions: fractional integers and numeric truthiness. */
  strict?: boolean;
  /** Reference date for formats that omit a date part. */
  referenceDate?: Date;
}

const ok = (value: CellValue, message = "Coercion successful"): CoercionResult => ({
  value,
  isValid: true,
  message,
  severity: "INFO",
  context: {},
});

const fail = (raw: CellValue, targetType: ValueType, message: string): CoercionResult => ({
  value: raw,
  isValid: false,
  message,
  severity: "ERROR",
  context: {
    code: ErrorCodes.TYPE_CONVERSION_FAILED,
    value: raw,
    target_type: targetType,
  },
});

export const isEmptyValue = (raw: CellValue | undefined): boolean =>
  raw === null || raw === undefined || (typeof raw === "string" && raw.trim() === "");

export function parseNumeric(text: string): number | undefined {
  const trimmed = text.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) return undefined;
  const parsed = Number.parseFloat(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseDateString(text: string, formats: readonly string[], referenceDate: Date = new Date()): Date | undefined {
  const trimmed = text.trim();
  for (const format of formats) {
    const parsed = parse(trimmed, format, referenceDate);
    if (isValid(parsed)) return parsed;
  }
  return undefined;
}

function stringify(raw: Exclude<CellValue, null>): string {
  return raw instanceof Date ? raw.toISOString() : String(raw);
}

function toInteger(raw: Exclude<CellValue, null>, options: CoercionOptions): CoercionResult {
  let numeric: number | undefined;
  if (typeof raw === "number") numeric = raw;
  else if (typeof raw === "boolean") numeric = raw ? 1 : 0;
  else if (typeof raw === "string") numeric = parseNumeric(raw);

  if (numeric === undefined || !Number.isFinite(numeric)) {
    return fail(raw, "integer", `Cannot convert '${stringify(raw)}' to integer`);
  }
  if (Number.isInteger(numeric)) {
    return typeof raw === "number" ? ok(raw, "Value already of type integer") : ok(numeric);
  }
  if (options.strict) {
    return fail(raw, "integer", `Value '${stringify(raw)}' is not a whole number`);
  }
  return ok(Math.trunc(numeric));
}

function toFloat(raw: Exclude<CellValue, null>): CoercionResult {
  if (typeof raw === "number") return ok(raw, "Value already of type float");
  if (typeof raw === "boolean") return ok(raw ? 1 : 0);
  if (typeof raw === "string") {
    const numeric = parseNumeric(raw);
    if (numeric !== undefined) return ok(numeric);
  }
  return fail(raw, "float", `Cannot convert '${stringify(raw)}' to float`);
}

function toBoolean(raw: Exclude<CellValue, null>, options: CoercionOptions): CoercionResult {
  if (typeof raw === "boolean") return ok(raw, "Value already of type boolean");
  if (typeof raw === "string") {
    const word = raw.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return ok(true);
    if (FALSE_WORDS.has(word)) return ok(false);
    return fail(raw, "boolean", `Cannot convert '${raw}' to boolean`);
  }
  if (options.strict && !(raw === 0 || raw === 1)) {
    return fail(raw, "boolean", `Cannot convert '${stringify(raw)}' to boolean in strict mode`);
  }
  return ok(raw instanceof Date ? true : raw !== 0);
}

function toDate(raw: Exclude<CellValue, null>, targetType: ValueType, options: CoercionOptions): CoercionResult {
  if (raw instanceof Date) {
    return isValid(raw) ? ok(raw, `Value already of type ${targetType}`) : fail(raw, targetType, "Invalid date value");
  }
  if (typeof raw === "string") {
    const formats = targetType === "time" ? [...DATETIME_FORMATS, ...TIME_FORMATS] : DATETIME_FORMATS;
    const parsed = parseDateString(raw, formats, options.referenceDate);
    if (parsed) return ok(parsed);
    return {
      ...fail(raw, targetType, `Cannot convert '${raw}' to ${targetType}: no matching format`),
      context: {
        code: ErrorCodes.TYPE_CONVERSION_FAILED,
        value: raw,
        target_type: targetType,
        tried_formats: formats,
      },
    };
  }
  return fail(raw, targetType, `Cannot convert '${stringify(raw)}' to ${targetType}`);
}

/**
 * Converts a raw cell value to `targetType`. A failed conversion keeps the raw value, so coercing
 * a result again gives the same value.
 */
export function coerceValue(raw: CellValue | undefined, targetType: ValueType, options: CoercionOptions = {}): CoercionResult {
  if (raw === undefined || raw === null || (typeof raw === "string" && raw.trim() === "")) {
    return {
      value: raw ?? null,
      isValid: false,
      message: "value is None/empty",
      severity: "ERROR",
      context: { code: ErrorCodes.REQUIRED_FIELD_MISSING, target_type: targetType },
    };
  }

  switch (targetType) {
    case "string":
    case "email":
    case "url":
      return typeof raw === "string" ? ok(raw, `Value already of type ${targetType}`) : ok(stringify(raw));
    case "integer":
      return toInteger(raw, options);
    case "float":
      return toFloat(raw);
    case "boolean":
      return toBoolean(raw, options);
    case "datetime":
    case "date":
    case "time":
      return toDate(raw, targetType, options);
  }
}
