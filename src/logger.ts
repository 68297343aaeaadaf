/**
 * Leveled console logger.
 *
 * The level defaults to `warn` and can be set through the
 * `BLAKE2B_LOG_LEVEL` environment variable or `initLogLevel`.
 *
 *   log.debug("[engine]", "compressing block", 0);
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(level: string): level is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, level);
}

function parseLevel(level: string | undefined): LogLevel | undefined {
  if (level === undefined) {
    return undefined;
  }
  const lowered = level.toLowerCase();
  return isLogLevel(lowered) ? lowered : undefined;
}

let minPriority = LEVEL_PRIORITY[parseLevel(process.env.BLAKE2B_LOG_LEVEL) ?? "warn"];

/** Sets the minimum level printed. Accepts any casing, e.g. "INFO". */
export function initLogLevel(level: string): void {
  const parsed = parseLevel(level);
  if (parsed === undefined) {
    throw new RangeError(`unknown log level "${level}"`);
  }
  minPriority = LEVEL_PRIORITY[parsed];
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= minPriority;
}

function createLogger(level: LogLevel, fn: (...args: unknown[]) => void) {
  return (...args: unknown[]): void => {
    if (isLevelEnabled(level)) {
      fn(...args);
    }
  };
}

export const log = {
  debug: createLogger("debug", console.debug.bind(console)),
  info: createLogger("info", console.info.bind(console)),
  warn: createLogger("warn", console.warn.bind(console)),
  error: createLogger("error", console.error.bind(console)),
};
