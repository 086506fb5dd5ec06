export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

export interface ModuleLogger {
  readonly name: string;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

let currentLevel: LogLevel = "warn";
const loggers = new Map<string, ModuleLogger>();

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function createLogger(name: string): ModuleLogger {
  const prefix = `[${name}]`;
  return {
    name,
    debug: (message, ...details) => {
      if (enabled("debug")) console.debug(prefix, message, ...details);
    },
    info: (message, ...details) => {
      if (enabled("info")) console.info(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      if (enabled("warn")) console.warn(prefix, message, ...details);
    },
    error: (message, ...details) => {
      if (enabled("error")) console.error(prefix, message, ...details);
    },
  };
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export const Logger = {
  getLogger(name: string): ModuleLogger {
    let logger = loggers.get(name);
    if (!logger) {
      logger = createLogger(name);
      loggers.set(name, logger);
    }
    return logger;
  },

  setLevel(level: LogLevel): void {
    currentLevel = level;
  },
};
