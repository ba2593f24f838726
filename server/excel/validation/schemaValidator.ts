import { toErrorMessage } from "../../utils/errors";
import { resolveAddress } from "../cellAddress";
import { ValidationResult, failed, passed } from "../models";
import { COMPOUND_LAT_LONG_KEY, PLEASE_SELECT } from "../tabExtractor";
import { normalizeValueType, type CellValue, type Schema, type ValueType, type WorkbookHandle } from "../types";

export const REQUIRED_SCHEMA_KEYS = ["fields", "tab_name", "schema_name"] as const;
export const REQUIRED_FIELD_PROPERTIES = ["name", "cell_reference", "data_type"] as const;

type FieldCategory = "text" | "datetime" | "numeric" | "contact" | "boolean";

const CATEGORY_KEYWORDS: ReadonlyArray<[FieldCategory, readonly string[]]> = [
  ["text", ["name", "title", "description"]],
  ["datetime", ["date", "time", "created", "updated"]],
  ["numeric", ["count", "number", "quantity", "amount"]],
  ["contact", ["email", "url", "link"]],
  ["boolean", ["active", "enabled", "status"]],
];

/** First category whose keyword appears in the field name. */
export function fieldCategory(fieldName: string): FieldCategory | undefined {
  const lowered = fieldName.toLowerCase();
  return CATEGORY_KEYWORDS.find(([, words]) => words.some(word => lowered.includes(word)))?.[0];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const nonEmptyString = (value: unknown): value is string => typeof value === "string" && value.trim().length > 0;

function fieldsOf(definition: Record<string, unknown>): unknown[] {
  return Array.isArray(definition.fields) ? definition.fields : [];
}

function fieldLocation(index: number): string {
  return `schema.fields[${index}]`;
}

export function validateFieldDefinition(field: unknown, index: number): ValidationResult {
  const name = `field_${index}`;
  const location = fieldLocation(index);

  if (!isRecord(field)) {
    return failed(name, `Field at index ${index} must be an object`, location);
  }
  const missing = REQUIRED_FIELD_PROPERTIES.filter(key => !(key in field));
  if (missing.length > 0) {
    return failed(name, `Field missing required properties: ${missing.join(", ")}`, location, "ERROR", {
      missing_properties: missing,
    });
  }
  if (!nonEmptyString(field.name)) {
    return failed(name, "Field name must be a non-empty string", location);
  }
  if (!nonEmptyString(field.cell_reference)) {
    return failed(name, "Field must have a valid cell reference", location);
  }
  try {
    resolveAddress(field.cell_reference);
  } catch (error) {
    return failed(name, `Invalid cell reference format: ${field.cell_reference}`, location, "ERROR", {
      reason: toErrorMessage(error),
    });
  }
  if (!nonEmptyString(field.data_type)) {
    return failed(name, "Field must have a valid data type", location);
  }
  if (!normalizeValueType(field.data_type)) {
    return failed(name, `Unsupported data type: ${field.data_type}`, location, "ERROR", { data_type: field.data_type });
  }
  return passed(name, `Field '${field.name}' is valid`, location, {
    field_name: field.name,
    cell_reference: field.cell_reference,
    data_type: field.data_type,
  });
}

export function validateFieldDefinitions(definition: unknown): ValidationResult {
  const fields = isRecord(definition) ? fieldsOf(definition) : [];
  const failures = fields.map(validateFieldDefinition).filter(result => !result.isValid);
  if (failures.length > 0) {
    return failed("field_definitions", `Schema contains ${failures.length} invalid field definitions`, "schema", "ERROR", {
      failed_fields: failures.map(result => result.toDict()),
    });
  }
  return passed("field_definitions", `All ${fields.length} field definitions are valid`, "schema", { field_count: fields.length });
}

/** Structure of a list-form schema definition: required keys, names, and every field. */
export function validateSchemaDefinition(definition: unknown): ValidationResult {
  if (!isRecord(definition)) {
    return failed("schema_structure", "Schema must be an object", "schema");
  }
  const missing = REQUIRED_SCHEMA_KEYS.filter(key => !(key in definition));
  if (missing.length > 0) {
    return failed("schema_structure", `Schema missing required fields: ${missing.join(", ")}`, "schema", "ERROR", {
      missing_fields: missing,
    });
  }
  if (!nonEmptyString(definition.schema_name)) {
    return failed("schema_name", "Schema must have a valid string name", "schema");
  }
  if (!nonEmptyString(definition.tab_name)) {
    return failed("tab_name", "Schema must have a valid string tab name", "schema");
  }
  if (!Array.isArray(definition.fields)) {
    return failed("fields", "Schema fields must be a list", "schema");
  }
  if (definition.fields.length === 0) {
    return failed("fields", "Schema must contain at least one field", "schema");
  }

  const fieldCheck = validateFieldDefinitions(definition);
  if (!fieldCheck.isValid) {
    return failed("schema_fields", fieldCheck.message, "schema", "ERROR", { ...fieldCheck.context });
  }
  return passed("schema_structure", `Schema '${definition.schema_name}' is valid with ${definition.fields.length} fields`, "schema", {
    schema_name: definition.schema_name,
    tab_name: definition.tab_name,
    field_count: definition.fields.length,
  });
}

/**
 * Supported types are an ERROR check. Fields sharing a name category but not a type produce a
 * separate WARNING; that heuristic never blocks.
 */
export function validateDataTypes(definition: unknown): ValidationResult[] {
  const fields = isRecord(definition) ? fieldsOf(definition) : [];
  const invalidTypes: Array<Record<string, unknown>> = [];
  const inconsistencies: Array<Record<string, unknown>> = [];
  const typeByCategory = new Map<FieldCategory, { type: ValueType; field: string }>();

  fields.forEach((field, index) => {
    if (!isRecord(field)) return;
    const fieldName = typeof field.name === "string" ? field.name : `field_${index}`;
    const rawType = field.data_type;
    const valueType = typeof rawType === "string" ? normalizeValueType(rawType) : undefined;
    if (!valueType) {
      invalidTypes.push({ field_index: index, field_name: fieldName, data_type: rawType ?? null });
      return;
    }

    const category = fieldCategory(fieldName);
    if (!category) return;
    const seen = typeByCategory.get(category);
    if (!seen) {
      typeByCategory.set(category, { type: valueType, field: fieldName });
    } else if (seen.type !== valueType) {
      inconsistencies.push({
        field_name: fieldName,
        field_category: category,
        expected_type: seen.type,
        actual_type: valueType,
        first_field: seen.field,
      });
    }
  });

  const results: ValidationResult[] = [];
  if (invalidTypes.length > 0) {
    results.push(
      failed("data_types", `Data type validation failed: ${invalidTypes.length} invalid data types`, "schema", "ERROR", {
        invalid_types: invalidTypes,
      })
    );
  }
  if (inconsistencies.length > 0) {
    results.push(
      failed("data_type_consistency", `${inconsistencies.length} fields disagree with the type used by their name category`, "schema", "WARNING", {
        type_inconsistencies: inconsistencies,
      })
    );
  }
  if (results.length === 0) {
    results.push(passed("data_types", "All data types in schema are valid and consistent", "schema", { field_count: fields.length }));
  }
  return results;
}

/** Address syntax and sheet limits for every field, against the worksheet the schema targets. */
export function validateCellReferences(definition: unknown, workbook: WorkbookHandle): ValidationResult {
  if (!isRecord(definition) || !nonEmptyString(definition.tab_name)) {
    return failed("cell_references", "Schema missing tab_name for cell reference validation", "schema");
  }
  const tabName = definition.tab_name;
  if (!workbook.sheet(tabName)) {
    return failed("cell_references", `Worksheet '${tabName}' not found in workbook`, tabName, "ERROR", {
      available_tabs: workbook.sheetNames(),
    });
  }

  const fields = fieldsOf(definition);
  const invalidReferences: Array<Record<string, unknown>> = [];
  fields.forEach((field, index) => {
    if (!isRecord(field) || typeof field.cell_reference !== "string" || field.cell_reference === "") return;
    try {
      resolveAddress(field.cell_reference);
    } catch (error) {
      invalidReferences.push({
        field_index: index,
        field_name: typeof field.name === "string" ? field.name : null,
        cell_reference: field.cell_reference,
        issue: toErrorMessage(error),
      });
    }
  });

  if (invalidReferences.length > 0) {
    return failed("cell_references", `Schema contains ${invalidReferences.length} invalid cell references`, tabName, "ERROR", {
      invalid_references: invalidReferences,
    });
  }
  return passed("cell_references", `All cell references in schema '${String(definition.schema_name ?? "")}' are valid`, tabName, {
    field_count: fields.length,
  });
}

function isCompatible(value: CellValue, valueType: ValueType): boolean {
  switch (valueType) {
    case "string":
      return typeof value === "string";
    case "email":
    case "url":
      return typeof value === "string" && value.length > 0;
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "float":
      return typeof value === "number";
    case "boolean":
      return typeof value === "boolean";
    case "datetime":
    case "date":
    case "time":
      return value instanceof Date || typeof value === "string";
  }
}

/** Schema against the data actually extracted for its tab. Mismatches are warnings. */
export function validateSchemaCompatibility(schema: Schema, tabData: Readonly<Record<string, CellValue>>): ValidationResult {
  const missingFields = schema.fields
    .map(field => field.name)
    .filter(name => name !== COMPOUND_LAT_LONG_KEY && !(name in tabData));
  if (missingFields.length > 0) {
    return failed("schema_compatibility", `Schema fields missing from tab data: ${missingFields.join(", ")}`, schema.tabName, "WARNING", {
      missing_fields: missingFields,
      available_fields: Object.keys(tabData),
    });
  }

  const issues: Array<Record<string, unknown>> = [];
  for (const field of schema.fields) {
    if (!(field.name in tabData)) continue;
    const value = tabData[field.name];
    if (value === null || value === "" || (field.isDropDown && value === PLEASE_SELECT)) continue;
    if (!isCompatible(value, field.valueType)) {
      issues.push({
        field_name: field.name,
        expected_type: field.valueType,
        actual_value: value,
        actual_type: value instanceof Date ? "date" : typeof value,
      });
    }
  }

  if (issues.length > 0) {
    return failed("schema_compatibility", `Schema contains ${issues.length} type compatibility issues`, schema.tabName, "WARNING", {
      type_compatibility_issues: issues,
    });
  }
  return passed("schema_compatibility", "Schema is compatible with tab data", schema.tabName, {
    field_count: schema.fields.length,
  });
}
