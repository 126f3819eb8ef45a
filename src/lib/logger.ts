export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : "info";

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LEVEL_ORDER, value);
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function formatLogLine(scope: string, message: string, context?: LogContext): string {
  const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : "";
  return `[${scope}] ${message}${suffix}`;
}

/**
 * Console logger with a `[Scope]` prefix, filtered by the process-wide level.
 *
 * @example
 * ```typescript
 * const logger = createLogger("Text Extractor");
 * logger.info("OCR fallback", { pageCount: 3 });
 * // [Text Extractor] OCR fallback {"pageCount":3}
 * ```
 */
export function createLogger(scope: string): Logger {
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];

  return {
    debug(message, context) {
      if (enabled("debug")) console.debug(formatLogLine(scope, message, context));
    },
    info(message, context) {
      if (enabled("info")) console.log(formatLogLine(scope, message, context));
    },
    warn(message, context) {
      if (enabled("warn")) console.warn(formatLogLine(scope, message, context));
    },
    error(message, context) {
      if (enabled("error")) console.error(formatLogLine(scope, message, context));
    },
  };
}
