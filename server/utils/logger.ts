import { getRunId } from "./runContext";

export type LogLevel = "debug" | "info" | "warn" | "error";

type Fields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: Fields): void;
  info(message: string, fields?: Fields): void;
  warn(message: string, fields?: Fields): void;
  error(message: string, fields?: Fields): void;
  child(context: Fields): Logger;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

// Substring match on the lower-cased key.
const SENSITIVE_KEYS = ["password", "token", "secret", "private_key", "authorization", "credentials"];
const REDACTED = "***REDACTED***";

const SINKS: Record<LogLevel, (line: string) => void> = {
  debug: line => console.debug(line),
  info: line => console.log(line),
  warn: line => console.warn(line),
  error: line => console.error(line),
};

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some(level => level === value);
}

function thresholdLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (configured && isLogLevel(configured)) return configured;

  switch (process.env.NODE_ENV) {
    case "test":
      return "warn";
    case "production":
      return "info";
    default:
      return "debug";
  }
}

function isSensitive(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.some(fragment => lower.includes(fragment));
}

function scrub(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (Array.isArray(value)) return value.map(scrub);
  if (value === null || typeof value !== "object") return value;
  return scrubFields(Object.fromEntries(Object.entries(value)));
}

function scrubFields(fields: Fields): Fields {
  const out: Fields = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = isSensitive(key) ? REDACTED : scrub(value);
  }
  return out;
}

function emit(level: LogLevel, message: string, context: Fields, fields?: Fields): void {
  if (LEVELS.indexOf(level) < LEVELS.indexOf(thresholdLevel())) return;

  const runId = getRunId();
  const entry: Fields = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(runId ? { runId } : {}),
    ...scrubFields(context),
    ...(fields ? scrubFields(fields) : {}),
  };

  SINKS[level](JSON.stringify(entry));
}

function bind(context: Fields): Logger {
  return {
    debug: (message, fields) => emit("debug", message, context, fields),
    info: (message, fields) => emit("info", message, context, fields),
    warn: (message, fields) => emit("warn", message, context, fields),
    error: (message, fields) => emit("error", message, context, fields),
    child: extra => bind({ ...context, ...extra }),
  };
}

/**
 * JSON-lines logger. Every line carries the component, the run id of the
 * surrounding ingestion run (if any) and whatever child context was bound.
 */
export function createLogger(component?: string): Logger {
  return bind(component ? { component } : {});
}
