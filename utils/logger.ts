import env from "./env-vars";

// Console logger. Timestamps outside production, threshold from LOG_LEVEL.

const isDev = env.NODE_ENV !== "production";

const LEVELS = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 } as const;

type LogLevel = keyof typeof LEVELS;

const threshold = LEVELS[env.LOG_LEVEL ?? (isDev ? "debug" : "info")];

function format(level: string, component: string | null, ...args: unknown[]) {
  const time = new Date().toISOString();
  const processedArgs = args.map((arg) => {
    if (arg instanceof Error) {
      return `${arg.name}: ${arg.message}`;
    }
    if (typeof arg === "object" && arg !== null) {
      try {
        return JSON.stringify(arg);
      } catch {
        return String(arg);
      }
    }
    return String(arg);
  });
  const prefix =
    (isDev ? `[${time}] [${level}]` : `[${level}]`) +
    (component ? ` [${component}]` : "");
  return prefix + (processedArgs.length ? " " : "") + processedArgs.join(" ");
}

const enabled = (level: LogLevel) => LEVELS[level] >= threshold;

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export function createLogger(component: string | null = null): Logger {
  return {
    debug: (...args) => {
      if (enabled("debug")) console.debug(format("DEBUG", component, ...args));
    },
    info: (...args) => {
      if (enabled("info")) console.info(format("INFO", component, ...args));
    },
    warn: (...args) => {
      if (enabled("warn")) console.warn(format("WARN", component, ...args));
    },
    error: (...args) => {
      if (enabled("error")) console.error(format("ERROR", component, ...args));
    },
  };
}

export const logger = createLogger();

// Usage: import { createLogger } from './utils/logger';
// const log = createLogger('batch');
// log.info('message');
