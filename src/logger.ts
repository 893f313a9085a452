export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : fallback;
}

let activeLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
};

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[activeLevel];
}

/**
 * Console logger tagged with a scope, e.g. `[credentials] ...`.
 * Callers must never pass credential payloads or key material.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(message) {
      if (enabled("debug")) console.debug(`${prefix} ${message}`);
    },
    info(message) {
      if (enabled("info")) console.log(`${prefix} ${message}`);
    },
    warn(message) {
      if (enabled("warn")) console.warn(`${prefix} ${message}`);
    },
    error(message, error) {
      if (!enabled("error")) return;
      if (error === undefined) {
        console.error(`${prefix} ${message}`);
      } else {
        console.error(`${prefix} ${message}`, error);
      }
    },
  };
}
