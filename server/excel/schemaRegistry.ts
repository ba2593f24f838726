import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { ErrorCodes, SchemaError, toErrorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { isValidAddress } from "./cellAddress";
import { normalizeValueType, type FieldConstraints, type FieldDefinition, type Schema, type SchemaRegistry } from "./types";

const log = createLogger("schemaRegistry");

export const ALIASES_FILE_NAME = "aliases.json";
export const DEFAULT_SCHEMA_DIR = fileURLToPath(new URL("./schemas", import.meta.url));

const cellAddress = z.string().refine(isValidAddress, value => ({ message: `'${value}' is not a valid cell address` }));

const valueType = z.string().transform((value, ctx) => {
  const normalized = normalizeValueType(value);
  if (!normalized) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unsupported value type '${value}'` });
    return z.NEVER;
  }
  return normalized;
});

const scalar = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const constraintsSchema = z
  .object({
    min_value: z.number().optional(),
    max_value: z.number().optional(),
    min_length: z.number().int().nonnegative().optional(),
    max_length: z.number().int().nonnegative().optional(),
    pattern: z.string().optional(),
    enum: z.array(scalar).optional(),
  })
  .strict();

type ConstraintsInput = z.infer<typeof constraintsSchema>;

function toConstraints(input: ConstraintsInput | undefined): FieldConstraints | undefined {
  if (!input) return undefined;
  return {
    minValue: input.min_value,
    maxValue: input.max_value,
    minLength: input.min_length,
    maxLength: input.max_length,
    pattern: input.pattern,
    enum: input.enum,
  };
}

const fieldCommon = {
  is_drop_down: z.boolean().default(false),
  label_address: cellAddress.optional(),
  label: z.string().optional(),
  required: z.boolean().optional(),
  format: z.string().optional(),
  constraints: constraintsSchema.optional(),
};

/** On-disk form: fields keyed by name. */
const schemaFileSchema = z.object({
  schema_name: z.string().min(1).optional(),
  tab_name: z.string().min(1),
  metadata: z.record(z.unknown()).default({}),
  schema: z
    .record(z.object({ value_address: cellAddress, value_type: valueType, ...fieldCommon }))
    .refine(fields => Object.keys(fields).length > 0, "schema must declare at least one field"),
});

/** Inline form accepted by processFile: fields as a list. */
export const schemaDefinitionSchema = z.object({
  schema_name: z.string().min(1),
  tab_name: z.string().min(1),
  metadata: z.record(z.unknown()).optional(),
  fields: z
    .array(z.object({ name: z.string().min(1), cell_reference: cellAddress, data_type: valueType, ...fieldCommon }))
    .min(1, "fields must contain at least one field")
    .refine(fields => new Set(fields.map(f => f.name)).size === fields.length, "field names must be unique"),
});

export type SchemaDefinition = z.input<typeof schemaDefinitionSchema>;

const aliasesFileSchema = z.record(z.string().min(1));

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

export function createSchemaRegistry(
  schemas: Record<string, Schema>,
  aliases: Record<string, string> = {}
): SchemaRegistry {
  const frozenSchemas: Record<string, Schema> = {};
  for (const [name, schema] of Object.entries(schemas)) {
    frozenSchemas[name] = Object.freeze({ ...schema, fields: Object.freeze([...schema.fields]) });
  }
  return Object.freeze({
    schemas: Object.freeze(frozenSchemas),
    aliases: Object.freeze({ ...aliases }),
  });
}

export function schemaFromDefinition(definition: unknown): Schema {
  const parsed = schemaDefinitionSchema.safeParse(definition);
  if (!parsed.success) {
    throw new SchemaError(`Malformed schema definition: ${describeIssues(parsed.error)}`, undefined, ErrorCodes.SCHEMA_INVALID, {
      issues: parsed.error.issues.map(issue => issue.message),
    });
  }
  const def = parsed.data;
  const fields: FieldDefinition[] = def.fields.map(field => ({
    name: field.name,
    valueAddress: field.cell_reference,
    valueType: field.data_type,
    isDropDown: field.is_drop_down,
    labelAddress: field.label_address,
    label: field.label,
    required: field.required,
    format: field.format,
    constraints: toConstraints(field.constraints),
  }));
  return { schemaName: def.schema_name, tabName: def.tab_name, fields, metadata: def.metadata };
}

export function schemaFromFile(json: unknown, fallbackName: string): Schema {
  const parsed = schemaFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new SchemaError(`Malformed schema file '${fallbackName}': ${describeIssues(parsed.error)}`, fallbackName);
  }
  const file = parsed.data;
  const fields: FieldDefinition[] = Object.entries(file.schema).map(([name, entry]) => ({
    name,
    valueAddress: entry.value_address,
    valueType: entry.value_type,
    isDropDown: entry.is_drop_down,
    labelAddress: entry.label_address,
    label: entry.label,
    required: entry.required,
    format: entry.format,
    constraints: toConstraints(entry.constraints),
  }));
  return { schemaName: file.schema_name ?? fallbackName, tabName: file.tab_name, fields, metadata: file.metadata };
}

function readJson(filePath: string): unknown {
  const text = fs.readFileSync(filePath, "utf-8");
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new SchemaError(`Schema file '${filePath}' is not valid JSON: ${toErrorMessage(error)}`, path.basename(filePath));
  }
}

/** Reads every `*.json` schema in `dir`, plus the optional alias map. */
export function loadSchemaRegistry(dir: string): SchemaRegistry {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new SchemaError(`Schema directory '${dir}' does not exist`, undefined, ErrorCodes.SCHEMA_NOT_FOUND, { dir });
  }

  const schemas: Record<string, Schema> = {};
  let aliases: Record<string, string> = {};

  for (const entry of fs.readdirSync(dir).sort()) {
    if (!entry.endsWith(".json")) continue;
    const filePath = path.join(dir, entry);

    if (entry === ALIASES_FILE_NAME) {
      const parsed = aliasesFileSchema.safeParse(readJson(filePath));
      if (!parsed.success) {
        throw new SchemaError(`Malformed alias file: ${describeIssues(parsed.error)}`);
      }
      aliases = parsed.data;
      continue;
    }

    const schema = schemaFromFile(readJson(filePath), path.basename(entry, ".json"));
    if (schemas[schema.schemaName]) {
      throw new SchemaError(`Duplicate schema name '${schema.schemaName}' in ${entry}`, schema.schemaName);
    }
    schemas[schema.schemaName] = schema;
  }

  log.info("Schema registry loaded", {
    dir,
    schemaCount: Object.keys(schemas).length,
    aliasCount: Object.keys(aliases).length,
  });

  return createSchemaRegistry(schemas, aliases);
}

let defaultRegistry: SchemaRegistry | undefined;

/** Bundled schemas (or EXCEL_SCHEMA_DIR), loaded on first use and shared read-only. */
export function getDefaultSchemaRegistry(): SchemaRegistry {
  if (!defaultRegistry) {
    defaultRegistry = loadSchemaRegistry(process.env.EXCEL_SCHEMA_DIR ?? DEFAULT_SCHEMA_DIR);
  }
  return defaultRegistry;
}
