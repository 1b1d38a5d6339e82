export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const value = String(raw ?? "").trim().toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return fallback;
}

/**
 * Console logger with a `[scope]` prefix. Messages below `level` are dropped.
 */
export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const prefix = `[${scope}]`;
  const enabled = (target: LogLevel): boolean => LEVEL_ORDER[target] >= LEVEL_ORDER[level];

  return {
    debug: (message, ...details) => {
      if (enabled("debug")) console.debug(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (enabled("info")) console.log(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (enabled("error")) console.error(`${prefix} ${message}`, ...details);
    }
  };
}

export function childLogger(parent: Logger, scope: string): Logger {
  return {
    debug: (message, ...details) => parent.debug(`[${scope}] ${message}`, ...details),
    info: (message, ...details) => parent.info(`[${scope}] ${message}`, ...details),
    warn: (message, ...details) => parent.warn(`[${scope}] ${message}`, ...details),
    error: (message, ...details) => parent.error(`[${scope}] ${message}`, ...details)
  };
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop
};
