import { getContext } from "../middleware/correlationContext";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const SENSITIVE_KEYS = ["password", "token", "secret", "apikey", "api_key", "authorization", "cookie"];
const REDACTED = "***REDACTED***";

export type LogMetadata = Record<string, unknown>;

/** Fields bound to a logger; they appear on every entry it writes. */
export interface LoggerContext {
  component?: string;
  traceId?: string;
  jobId?: string;
  userId?: string;
  pipeline?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
  child(context: LoggerContext): Logger;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

function thresholdFromEnv(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (configured && isLogLevel(configured)) return configured;
  switch (process.env.NODE_ENV) {
    case "test":
      return "error";
    case "production":
      return "info";
    default:
      return "debug";
  }
}

function isSensitive(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitive) => lower.endsWith(sensitive));
}

function redactFields(fields: object): LogMetadata {
  return Object.fromEntries(
    Object.entries(fields).map(([key, inner]): [string, unknown] => [key, isSensitive(key) ? REDACTED : redact(inner)])
  );
}

export function redact(value: unknown): unknown {
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (Array.isArray(value)) return value.map(redact);
  if (value === null || typeof value !== "object") return value;
  return redactFields(value);
}

/**
 * Builds one JSON log line. Correlation ids come from the bound context first,
 * then from the active request or job-run scope.
 */
export function buildEntry(
  level: LogLevel,
  message: string,
  bound: LoggerContext,
  metadata: LogMetadata = {}
): Record<string, unknown> {
  const scope = getContext();
  const { component, traceId, jobId, userId, ...extra } = bound;

  const entry: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    message,
    component,
    traceId: traceId ?? scope?.traceId,
    jobId: jobId ?? scope?.jobId,
    userId: userId ?? scope?.userId,
  };
  for (const key of Object.keys(entry)) {
    if (entry[key] === undefined) delete entry[key];
  }

  return { ...entry, ...redactFields({ ...extra, ...metadata }) };
}

const sinks: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function bind(context: LoggerContext): Logger {
  const write = (level: LogLevel) => (message: string, metadata?: LogMetadata) => {
    if (LEVELS[level] < LEVELS[thresholdFromEnv()]) return;
    sinks[level](JSON.stringify(buildEntry(level, message, context, metadata)));
  };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
    child: (childContext) => bind({ ...context, ...childContext }),
  };
}

export function createLogger(component?: string): Logger {
  return bind({ component });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
