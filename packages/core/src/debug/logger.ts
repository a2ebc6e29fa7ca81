/**
 * packages/core/src/debug/logger.ts - Scoped leveled logging.
 *
 * Why: The event core reports stale targets, dropped messages and platform
 * failures without ever throwing. Those reports go through a Logger that the
 * window owner supplies, so tests can capture them and hosts can silence them.
 */

/**
 * Log levels, lowest first. "silent" disables every record.
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

export type LogRecordLevel = Exclude<LogLevel, "silent">;

export type Logger = Readonly<{
  scope: string;
  trace: (message: string) => void;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}>;

export type LogSink = (level: LogRecordLevel, scope: string, message: string) => void;

const NODE_ENV = process.env.NODE_ENV ?? "development";
const DEV_MODE = NODE_ENV !== "production";

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = Object.freeze({
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
});

export const LOG_LEVELS: readonly LogLevel[] = Object.freeze([
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "silent",
]);

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === "string" && LOG_LEVELS.some((level) => level === v);
}

const consoleSink: LogSink = (level, scope, message) => {
  const line = `[${scope}] ${message}`;
  switch (level) {
    case "trace":
    case "debug":
      console.debug(line);
      return;
    case "info":
      console.info(line);
      return;
    case "warn":
      console.warn(line);
      return;
    case "error":
      console.error(line);
      return;
  }
};

/**
 * Create a logger that forwards records at or above `level` to `sink`.
 */
export function createLogger(scope: string, level: LogLevel, sink: LogSink): Logger {
  const threshold = LEVEL_RANK[level];
  const emit = (recordLevel: LogRecordLevel) => (message: string) => {
    if (LEVEL_RANK[recordLevel] < threshold) return;
    sink(recordLevel, scope, message);
  };
  return Object.freeze({
    scope,
    trace: emit("trace"),
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  });
}

export function createConsoleLogger(scope: string, level: LogLevel = "warn"): Logger {
  return createLogger(scope, level, consoleSink);
}

/**
 * Report a broken internal invariant.
 *
 * Development builds log the failure at error level; production builds skip
 * the check. Never throws.
 */
export function debugAssert(logger: Logger, condition: boolean, message: string): void {
  if (condition || !DEV_MODE) return;
  logger.error(`assertion failed: ${message}`);
}
