export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

// Read directly from process.env so the logger stays usable before env.ts is parsed.
let minLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : "info";

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function emit(level: LogLevel, message: string, scope: string | undefined, context: LogContext = {}): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

  const payload = {
    ts: new Date().toISOString(),
    level,
    ...(scope ? { scope } : {}),
    message,
    ...context,
  };

  const serialized = JSON.stringify(payload);

  if (level === "error") {
    console.error(serialized);
    return;
  }

  if (level === "warn") {
    console.warn(serialized);
    return;
  }

  console.log(serialized);
}

function createLogger(scope?: string): Logger {
  return {
    debug: (message, context) => emit("debug", message, scope, context),
    info: (message, context) => emit("info", message, scope, context),
    warn: (message, context) => emit("warn", message, scope, context),
    error: (message, context) => emit("error", message, scope, context),
    child: (childScope) => createLogger(scope ? `${scope}.${childScope}` : childScope),
  };
}

export const logger: Logger = createLogger();
