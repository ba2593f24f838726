import { getContext } from "./processingContext";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SENSITIVE_KEYS = ["password", "token", "secret", "key", "authorization", "cookie", "ssn"];

const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LOG_LEVEL_PRIORITY, value);

export const redact = (value: unknown): unknown => {
  if (value === null || typeof value !== "object") return value;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(redact);

  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    if (SENSITIVE_KEYS.some(k => key.toLowerCase().includes(k))) {
      out[key] = "***REDACTED***";
    } else {
      out[key] = redact(inner);
    }
  }
  return out;
};

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  traceId?: string;
  filePath?: string;
  component?: string;
  durationMs?: number;
  [key: string]: unknown;
}

export interface LoggerContext {
  component?: string;
  tabName?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
  child(context: LoggerContext): Logger;
}

function getConfiguredLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[getConfiguredLogLevel()];
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  context: LoggerContext,
  metadata?: Record<string, unknown>
): LogEntry {
  const processingContext = getContext();

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  if (processingContext) {
    entry.traceId = processingContext.traceId;
    if (processingContext.filePath) {
      entry.filePath = processingContext.filePath;
    }
  }

  const { component, ...otherContext } = context;
  if (component) {
    entry.component = component;
  }

  if (Object.keys(otherContext).length > 0) {
    Object.assign(entry, redact(otherContext));
  }

  if (metadata) {
    Object.assign(entry, redact(metadata));
  }

  return entry;
}

function writeLog(entry: LogEntry): void {
  const output = JSON.stringify(entry);

  switch (entry.level) {
    case "error":
      console.error(output);
      break;
    case "warn":
      console.warn(output);
      break;
    case "debug":
      console.debug(output);
      break;
    default:
      console.log(output);
  }
}

function createLogMethod(
  level: LogLevel,
  context: LoggerContext
): (message: string, metadata?: Record<string, unknown>) => void {
  return (message: string, metadata?: Record<string, unknown>) => {
    if (!shouldLog(level)) return;
    writeLog(formatLogEntry(level, message, context, metadata));
  };
}

function createLoggerWithContext(context: LoggerContext): Logger {
  return {
    debug: createLogMethod("debug", context),
    info: createLogMethod("info", context),
    warn: createLogMethod("warn", context),
    error: createLogMethod("error", context),
    child(childContext: LoggerContext): Logger {
      return createLoggerWithContext({ ...context, ...childContext });
    },
  };
}

export function createLogger(component?: string): Logger {
  return createLoggerWithContext({ component });
}

export const logger = createLogger();
