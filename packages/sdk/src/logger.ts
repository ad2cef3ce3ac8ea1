export type LogLevel = "debug" | "info" | "warn" | "error";

export interface TxLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const noop = (): void => undefined;

export const NOOP_LOGGER: TxLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export function createConsoleLogger(prefix = "FlowTx", level: LogLevel = "info"): TxLogger {
  const enabled = (candidate: LogLevel): boolean => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];
  return {
    debug: (message, meta) => {
      if (enabled("debug")) console.debug(`[${prefix}] ${message}`, meta ?? "");
    },
    info: (message, meta) => {
      if (enabled("info")) console.info(`[${prefix}] ${message}`, meta ?? "");
    },
    warn: (message, meta) => {
      if (enabled("warn")) console.warn(`[${prefix}] ${message}`, meta ?? "");
    },
    error: (message, meta) => {
      if (enabled("error")) console.error(`[${prefix}] ${message}`, meta ?? "");
    },
  };
}
