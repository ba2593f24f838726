export * from "./cellAddress";
export * from "./types";
export * from "./models";
export * from "./valueCoercer";
export * from "./keyValueScanner";
export * from "./schemaResolver";
export * from "./schemaRegistry";
export * from "./tabExtractor";
export * from "./workbookHandle";
export * from "./workbookParser";
export * from "./excelProcessor";
export * from "./validation/constraints";
export * from "./validation/dataValidator";
export * from "./validation/fileValidator";
export * from "./validation/schemaValidator";
export * from "../config/excelConfig";
export { parseEnv, excelConfigFromEnv, type Env } from "../config/env";
export * from "../utils/errors";
export { createLogger, logger, type Logger, type LogLevel } from "../utils/logger";
