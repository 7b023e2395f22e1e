export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Console-backed logger. Messages below `level` are dropped.
 */
export function createConsoleLogger(level: LogLevel = "warn", prefix = "[survival]"): Logger {
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];

  return {
    debug: (message, ...details) => {
      if (enabled("debug")) console.debug(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (enabled("info")) console.info(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (enabled("error")) console.error(`${prefix} ${message}`, ...details);
    },
  };
}

export const silentLogger: Logger = createConsoleLogger("silent");

export const defaultLogger: Logger = createConsoleLogger("warn");
