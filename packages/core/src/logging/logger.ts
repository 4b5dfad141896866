import { randomUUID } from "node:crypto";
import { DEFAULT_SERVICE_NAME } from "@phi-shield/shared";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export interface LogMetadata {
  [key: string]: unknown;
}

export interface LogContext {
  correlationId?: string;
  component?: string;
  actor?: string;
}

export interface ErrorInfo {
  name: string;
  message: string;
  code?: string;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  correlationId: string;
  component?: string;
  actor?: string;
  metadata?: LogMetadata;
  error?: ErrorInfo;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  fatal(message: string, error?: Error, metadata?: LogMetadata): void;
  child(context: LogContext): Logger;
}

/** Output sink for log entries. Defaults to one JSON line per entry on stdout. */
export type LogOutput = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Service name included in every entry. */
  service?: string;
  /** Minimum level to emit. Defaults to `info`. */
  level?: LogLevel;
  context?: LogContext;
  output?: LogOutput;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

const defaultLogOutput: LogOutput = (entry) => {
  process.stdout.write(JSON.stringify(entry) + "\n");
};

function errorInfo(error: Error): ErrorInfo {
  const info: ErrorInfo = { name: error.name, message: error.message, stack: error.stack };
  if ("code" in error && typeof error.code === "string") info.code = error.code;
  return info;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const service = options.service ?? DEFAULT_SERVICE_NAME;
  const minLevel = options.level ?? "info";
  const context: LogContext = {
    ...options.context,
    correlationId: options.context?.correlationId ?? randomUUID(),
  };
  const output = options.output ?? defaultLogOutput;

  function log(level: LogLevel, message: string, error?: Error, metadata?: LogMetadata): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service,
      correlationId: context.correlationId ?? "",
    };
    if (context.component) entry.component = context.component;
    if (context.actor) entry.actor = context.actor;
    if (metadata && Object.keys(metadata).length > 0) entry.metadata = metadata;
    if (error) entry.error = errorInfo(error);

    output(entry);
  }

  return {
    debug: (message, metadata) => log("debug", message, undefined, metadata),
    info: (message, metadata) => log("info", message, undefined, metadata),
    warn: (message, metadata) => log("warn", message, undefined, metadata),
    error: (message, error, metadata) => log("error", message, error, metadata),
    fatal: (message, error, metadata) => log("fatal", message, error, metadata),
    child: (childContext) =>
      createLogger({
        service,
        level: minLevel,
        context: { ...context, ...childContext },
        output,
      }),
  };
}

/** Logger that drops everything; for callers that opt out of logging. */
export function createSilentLogger(): Logger {
  return createLogger({ output: () => undefined });
}
