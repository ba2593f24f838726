import { toErrorMessage } from "../../utils/errors";
import { ValidationResult, failed, passed } from "../models";
import { hasEntry } from "../records";
import { PLEASE_SELECT } from "../tabExtractor";
import type { BusinessRule, CellValue, ExtractedRecord, FieldConstraints, ValueType } from "../types";
import { coerceValue } from "../valueCoercer";
import { validateDataFormat, validateFieldConstraints } from "./constraints";

/** Message templates used by DataValidator. Pass a partial set to override wording per caller. */
export interface ValidationMessages {
  valueMissing: string;
  valueValid: (valueType: ValueType) => string;
  valueConverted: (valueType: ValueType) => string;
  valueInvalid: (value: string, valueType: ValueType, reason: string) => string;
  noRequiredFields: string;
  requiredFieldsFailed: (issues: string) => string;
  requiredFieldsPassed: (count: number) => string;
  ruleFailed: (ruleName: string) => string;
  rulePassed: (ruleName: string) => string;
  ruleInvalid: (ruleName: string) => string;
  ruleError: (ruleName: string, reason: string) => string;
}

export const DEFAULT_VALIDATION_MESSAGES: Readonly<ValidationMessages> = Object.freeze({
  valueMissing: "Cell value is null or empty",
  valueValid: (valueType: ValueType) => `Cell value is valid ${valueType}`,
  valueConverted: (valueType: ValueType) => `Cell value converted to ${valueType}`,
  valueInvalid: (value: string, valueType: ValueType, reason: string) => `Cannot convert value '${value}' to ${valueType}: ${reason}`,
  noRequiredFields: "No required fields specified",
  requiredFieldsFailed: (issues: string) => `Required fields validation failed: ${issues}`,
  requiredFieldsPassed: (count: number) => `All ${count} required fields are present and non-empty`,
  ruleFailed: (ruleName: string) => `Business rule ${ruleName} failed`,
  rulePassed: (ruleName: string) => `Business rule ${ruleName} passed`,
  ruleInvalid: (ruleName: string) => `Invalid business rule: ${ruleName}`,
  ruleError: (ruleName: string, reason: string) => `Business rule ${ruleName} execution error: ${reason}`,
});

const describe = (value: CellValue): string => (value instanceof Date ? value.toISOString() : String(value));

/** Value-level checks over extracted data. Holds no state beyond its message set. */
export class DataValidator {
  private readonly messages: ValidationMessages;

  constructor(messages: Partial<ValidationMessages> = {}) {
    this.messages = { ...DEFAULT_VALIDATION_MESSAGES, ...messages };
  }

  validateCellValue(value: CellValue, valueType: ValueType, fieldName: string): ValidationResult {
    if (value === null || value === "") {
      return failed(fieldName, this.messages.valueMissing, fieldName, "ERROR", { value, expected_type: valueType });
    }

    const coerced = coerceValue(value, valueType);
    if (!coerced.isValid) {
      return failed(fieldName, this.messages.valueInvalid(describe(value), valueType, coerced.message), fieldName, "ERROR", {
        value,
        expected_type: valueType,
        conversion_error: coerced.message,
      });
    }
    if (coerced.value === value) {
      return passed(fieldName, this.messages.valueValid(valueType), fieldName, { value, actual_type: typeof value });
    }
    return passed(fieldName, this.messages.valueConverted(valueType), fieldName, {
      original_value: value,
      converted_value: coerced.value,
      original_type: value instanceof Date ? "date" : typeof value,
      expected_type: valueType,
    });
  }

  /** `dropDownFields` names fields whose `Please Select` placeholder counts as empty. */
  validateRequiredFields(
    data: Readonly<ExtractedRecord>,
    requiredFields: readonly string[],
    location = "data",
    dropDownFields: readonly string[] = []
  ): ValidationResult {
    if (requiredFields.length === 0) {
      return passed("required_fields", this.messages.noRequiredFields, location);
    }

    const missingFields: string[] = [];
    const emptyFields: string[] = [];
    for (const field of requiredFields) {
      if (!hasEntry(data, field)) {
        missingFields.push(field);
        continue;
      }
      const value = data[field];
      const unselected = value === PLEASE_SELECT && dropDownFields.includes(field);
      if (value === null || (typeof value === "string" && value.trim() === "") || unselected) {
        emptyFields.push(field);
      }
    }

    if (missingFields.length > 0 || emptyFields.length > 0) {
      const issues: string[] = [];
      if (missingFields.length > 0) issues.push(`${missingFields.length} missing fields`);
      if (emptyFields.length > 0) issues.push(`${emptyFields.length} empty fields`);
      return failed("required_fields", this.messages.requiredFieldsFailed(issues.join(", ")), location, "ERROR", {
        missing_fields: missingFields,
        empty_fields: emptyFields,
        required_fields: [...requiredFields],
        available_fields: Object.keys(data),
      });
    }

    return passed("required_fields", this.messages.requiredFieldsPassed(requiredFields.length), location, {
      required_fields: [...requiredFields],
      field_count: requiredFields.length,
    });
  }

  validateFieldConstraints(value: CellValue, constraints: FieldConstraints | undefined, fieldName?: string, location?: string): ValidationResult {
    return validateFieldConstraints(value, constraints, fieldName, location);
  }

  validateDataFormat(value: CellValue, formatType: string, fieldName?: string, location?: string): ValidationResult {
    return validateDataFormat(value, formatType, fieldName, location);
  }

  /** Each rule is evaluated on its own; a throwing condition becomes that rule's ERROR. */
  validateBusinessRules(data: Readonly<ExtractedRecord>, rules: readonly BusinessRule[]): ValidationResult[] {
    return rules.map((rule, index) => {
      const fieldName = `business_rule_${index}`;
      const ruleName = rule.name || `rule_${index}`;

      if (typeof rule.condition !== "function") {
        return failed(fieldName, this.messages.ruleInvalid(ruleName), "business_rules", "ERROR", {
          rule_name: ruleName,
          issue: "Invalid condition function",
        });
      }

      try {
        const rulePassed = rule.condition(data);
        return rulePassed
          ? passed(fieldName, this.messages.rulePassed(ruleName), "business_rules", { rule_name: ruleName, rule_passed: true })
          : failed(fieldName, rule.message || this.messages.ruleFailed(ruleName), "business_rules", "ERROR", {
              rule_name: ruleName,
              rule_passed: false,
            });
      } catch (error) {
        return failed(fieldName, this.messages.ruleError(ruleName, toErrorMessage(error)), "business_rules", "ERROR", {
          rule_name: ruleName,
          exception: toErrorMessage(error),
        });
      }
    });
  }
}
