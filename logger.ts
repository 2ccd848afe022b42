
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const PREFIX = "[lexicon-editor]";

let threshold: LogLevel = "info";

export const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

export const setLogLevel = (level: LogLevel) => {
  threshold = level;
};

export const getLogLevel = (): LogLevel => threshold;

const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];

export const logger = {
  debug: (message: string, ...details: unknown[]) => {
    if (enabled("debug")) console.debug(PREFIX, message, ...details);
  },
  info: (message: string, ...details: unknown[]) => {
    if (enabled("info")) console.log(PREFIX, message, ...details);
  },
  warn: (message: string, ...details: unknown[]) => {
    if (enabled("warn")) console.warn(PREFIX, message, ...details);
  },
  error: (message: string, ...details: unknown[]) => {
    if (enabled("error")) console.error(PREFIX, message, ...details);
  }
};
