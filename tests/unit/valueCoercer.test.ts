import { describe, it, expect } from "vitest";
import { coerceValue, parseDateString, parseNumeric, DATETIME_FORMATS } from "../../server/excel/valueCoercer";
import type { CellValue, ValueType } from "../../server/excel/types";

describe("value coercion", () => {
  it("reports empty input as missing", () => {
    for (const raw of [null, undefined, "", "   "]) {
      const result = coerceValue(raw, "string");
      expect(result.isValid).toBe(false);
      expect(result.message).toBe("value is None/empty");
      expect(result.context.code).toBe("REQUIRED_FIELD_MISSING");
    }
  });

  describe("string-like targets", () => {
    it("passes strings through and stringifies the rest", () => {
      expect(coerceValue("abc", "string")).toMatchObject({ value: "abc", isValid: true, message: "Value already of type string" });
      expect(coerceValue(42, "string").value).toBe("42");
      expect(coerceValue(true, "url").value).toBe("true");
      expect(coerceValue(new Date(Date.UTC(2024, 0, 2)), "email").value).toBe("2024-01-02T00:00:00.000Z");
    });
  });

  describe("integer", () => {
    it("parses numeric text", () => {
      expect(coerceValue("17", "integer")).toMatchObject({ value: 17, isValid: true });
      expect(coerceValue(5, "integer").message).toBe("Value already of type integer");
    });

    it("truncates fractions unless strict", () => {
      expect(coerceValue("12.7", "integer").value).toBe(12);
      expect(coerceValue(-3.9, "integer").value).toBe(-3);
      const strict = coerceValue("12.7", "integer", { strict: true });
      expect(strict.isValid).toBe(false);
      expect(strict.message).toBe("Value '12.7' is not a whole number");
      expect(strict.value).toBe("12.7");
    });

    it("maps booleans to 1 and 0", () => {
      expect(coerceValue(true, "integer").value).toBe(1);
      expect(coerceValue(false, "integer").value).toBe(0);
    });

    it("keeps the raw value when conversion fails", () => {
      const result = coerceValue("abc", "integer");
      expect(result).toMatchObject({ value: "abc", isValid: false, severity: "ERROR", message: "Cannot convert 'abc' to integer" });
      expect(result.context).toEqual({ code: "TYPE_CONVERSION_FAILED", value: "abc", target_type: "integer" });
    });
  });

  describe("float", () => {
    it("parses decimal and exponent notation", () => {
      expect(coerceValue("3.5", "float").value).toBe(3.5);
      expect(coerceValue(" 2e3 ", "float").value).toBe(2000);
      expect(coerceValue("-.25", "float").value).toBe(-0.25);
    });

    it("rejects text with trailing garbage", () => {
      expect(coerceValue("12ppm", "float").isValid).toBe(false);
    });
  });

  describe("boolean", () => {
    it("accepts the usual words in any case", () => {
      expect(coerceValue("Yes", "boolean").value).toBe(true);
      expect(coerceValue("ON", "boolean").value).toBe(true);
      expect(coerceValue("no", "boolean").value).toBe(false);
      expect(coerceValue("0", "boolean").value).toBe(false);
    });

    it("rejects other words", () => {
      const result = coerceValue("maybe", "boolean");
      expect(result.isValid).toBe(false);
      expect(result.value).toBe("maybe");
      expect(result.message).toContain("boolean");
    });

    it("uses numeric truthiness unless strict", () => {
      expect(coerceValue(2, "boolean").value).toBe(true);
      expect(coerceValue(0, "boolean").value).toBe(false);
      expect(coerceValue(2, "boolean", { strict: true }).isValid).toBe(false);
      expect(coerceValue(1, "boolean", { strict: true }).value).toBe(true);
    });
  });

  describe("dates and times", () => {
    it("tries each date format in turn", () => {
      const iso = coerceValue("2024-03-05", "datetime").value;
      expect(iso).toBeInstanceOf(Date);
      if (iso instanceof Date) {
        expect([iso.getFullYear(), iso.getMonth(), iso.getDate()]).toEqual([2024, 2, 5]);
      }

      const dayFirst = coerceValue("31/12/2024", "date").value;
      if (!(dayFirst instanceof Date)) throw new Error("expected a date");
      expect([dayFirst.getFullYear(), dayFirst.getMonth(), dayFirst.getDate()]).toEqual([2024, 11, 31]);
    });

    it("reads a timestamp with time of day", () => {
      const value = coerceValue("2024-03-05 10:30:15", "datetime").value;
      if (!(value instanceof Date)) throw new Error("expected a date");
      expect([value.getHours(), value.getMinutes(), value.getSeconds()]).toEqual([10, 30, 15]);
    });

    it("accepts a bare time for the time type, on the reference date", () => {
      const value = coerceValue("14:30", "time", { referenceDate: new Date(2024, 0, 10) }).value;
      if (!(value instanceof Date)) throw new Error("expected a date");
      expect([value.getFullYear(), value.getMonth(), value.getDate(), value.getHours(), value.getMinutes()]).toEqual([2024, 0, 10, 14, 30]);
      expect(coerceValue("14:30", "datetime").isValid).toBe(false);
    });

    it("lists the formats it tried on failure", () => {
      const result = coerceValue("next tuesday", "date");
      expect(result.message).toBe("Cannot convert 'next tuesday' to date: no matching format");
      expect(result.context.tried_formats).toEqual([...DATETIME_FORMATS]);
    });

    it("passes dates through and rejects invalid ones", () => {
      const when = new Date(2024, 5, 1);
      expect(coerceValue(when, "date").value).toBe(when);
      expect(coerceValue(new Date(Number.NaN), "date").isValid).toBe(false);
    });
  });

  it("is idempotent: coercing a result again yields the same value", () => {
    const cases: Array<[CellValue, ValueType]> = [
      ["12.7", "integer"],
      ["Yes", "boolean"],
      ["maybe", "boolean"],
      ["3.25", "float"],
      [7, "string"],
      ["2024-03-05", "date"],
      ["abc", "integer"],
    ];
    for (const [raw, type] of cases) {
      const once = coerceValue(raw, type);
      const twice = coerceValue(once.value, type);
      expect(twice.value).toEqual(once.value);
      expect(twice.isValid).toBe(once.isValid);
    }
  });

  it("exposes its parsing helpers", () => {
    expect(parseNumeric("1e-2")).toBe(0.01);
    expect(parseNumeric("1,000")).toBeUndefined();
    expect(parseDateString("not a date", DATETIME_FORMATS)).toBeUndefined();
  });
});
