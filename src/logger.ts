// Console-backed leveled logger shared by every component.
// Components take a Logger in their deps so tests can pass vi.fn() spies.

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Creates a logger that prefixes every line with `[LEVEL] [component]`.
 * Lines below `level` are dropped.
 */
export function createLogger(component: string, level: LogLevel = "info"): Logger {
  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];

  return {
    debug: (msg, ...args) => {
      if (enabled("debug")) console.log(`[DEBUG] [${component}] ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled("info")) console.log(`[INFO] [${component}] ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled("warn")) console.warn(`[WARN] [${component}] ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled("error")) console.error(`[ERROR] [${component}] ${msg}`, ...args);
    },
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
