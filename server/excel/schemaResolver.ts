import { ConfigurationError, ErrorCodes } from "../utils/errors";
import type { Schema, SchemaRegistry } from "./types";

export type SchemaResolution =
  | { found: true; schema: Schema; canonicalName: string }
  | { found: false; name: string };

const hasOwn = (record: Readonly<Record<string, unknown>>, key: string): boolean =>
  Object.prototype.hasOwnProperty.call(record, key);

/**
 * Resolves a schema name through at most one alias hop.
 * An alias whose target is itself an alias resolves to not-found.
 */
export function resolveSchema(name: string, registry: SchemaRegistry | null | undefined): SchemaResolution {
  if (registry === null || registry === undefined) {
    throw new ConfigurationError("Schema registry is not configured", { name }, ErrorCodes.CONFIG_MISSING);
  }

  const canonicalName = hasOwn(registry.aliases, name) ? registry.aliases[name] : name;
  if (!hasOwn(registry.schemas, canonicalName)) {
    return { found: false, name };
  }
  return { found: true, schema: registry.schemas[canonicalName], canonicalName };
}
