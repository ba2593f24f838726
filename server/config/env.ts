import "./loadEnv";
import { z } from "zod";
import { ConfigurationError, ErrorCodes } from "../utils/errors";
import { createLogger } from "../utils/logger";
import {
  createProcessingConfig,
  type ExcelProcessingConfig,
  type ExcelProcessingConfigInput,
} from "./excelConfig";

const log = createLogger("env");

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform(value => value === "true" || value === "1");

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
  EXCEL_MAX_FILE_SIZE_MB: z.coerce.number().positive().optional(),
  EXCEL_MAX_TABS: z.coerce.number().int().positive().optional(),
  EXCEL_STRICT_MODE: booleanFlag.optional(),
  EXCEL_SCHEMA_DIR: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const fieldErrors = result.error.flatten().fieldErrors;
    const summary = Object.entries(fieldErrors)
      .map(([key, msgs]) => `${key}: ${(msgs ?? []).join(", ")}`)
      .join("; ");
    log.error("Invalid environment variables", { fieldErrors });
    throw new ConfigurationError(`Invalid environment variables: ${summary}`, { fieldErrors }, ErrorCodes.CONFIG_INVALID);
  }

  return result.data;
}

/** Layers EXCEL_* environment overrides onto the default processing configuration. */
export function excelConfigFromEnv(
  source: NodeJS.ProcessEnv = process.env,
  base: ExcelProcessingConfigInput = {}
): ExcelProcessingConfig {
  const env = parseEnv(source);
  const parse = { ...base.parse };

  if (env.EXCEL_MAX_FILE_SIZE_MB !== undefined) parse.maxFileSizeMb = env.EXCEL_MAX_FILE_SIZE_MB;
  if (env.EXCEL_MAX_TABS !== undefined) parse.maxTabs = env.EXCEL_MAX_TABS;
  if (env.EXCEL_STRICT_MODE !== undefined) parse.strictMode = env.EXCEL_STRICT_MODE;

  return createProcessingConfig({ ...base, parse });
}
