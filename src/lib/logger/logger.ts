import { getConfig } from "../config";

import type { LogLevel } from "./schema";

type LogContext = Record<string, unknown>;

export interface LoggerConfig {
  level: LogLevel;
  /** Human-readable single-line output instead of JSON lines */
  pretty?: boolean;
  /** Context merged into every entry */
  context?: LogContext;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, error?: Error, context?: LogContext) => void;
  /** Returns a logger that adds `context` to every entry */
  child: (context: LogContext) => Logger;
}

const severity: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// debug and info go to stdout, warn and error to stderr
const sinks: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.log(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

const toEntry = (level: LogLevel, message: string, context: LogContext, error?: Error): LogEntry => {
  const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
  if (Object.keys(context).length > 0) {
    entry.context = context;
  }
  if (error) {
    entry.error = { name: error.name, message: error.message };
    if (error.stack) {
      entry.error.stack = error.stack;
    }
  }
  return entry;
};

const formatPretty = (entry: LogEntry): string => {
  let line = `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}`;
  if (entry.context) {
    line += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    line += ` ${entry.error.name}: ${entry.error.message}`;
  }
  return line;
};

const defaultLoggerConfig = (): LoggerConfig => {
  const config = getConfig();
  return {
    level: config.logging.level,
    pretty: config.runtime.nodeEnv === "development",
  };
};

export const createLogger = (loggerConfig: LoggerConfig = defaultLoggerConfig()): Logger => {
  const { level, pretty = false, context: baseContext = {} } = loggerConfig;
  const threshold = severity[level];

  const write = (entryLevel: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (severity[entryLevel] < threshold) {
      return;
    }
    const entry = toEntry(entryLevel, message, { ...baseContext, ...context }, error);
    sinks[entryLevel](pretty ? formatPretty(entry) : JSON.stringify(entry));
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, error, context) => write("error", message, context, error),
    child: (context) => createLogger({ level, pretty, context: { ...baseContext, ...context } }),
  };
};

let defaultLogger: Logger | undefined;

/**
 * Process-wide logger configured from the environment. Created on first use so
 * that importing the library never parses `process.env`.
 */
export const getDefaultLogger = (): Logger => {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
};
