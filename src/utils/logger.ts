// Log levels enum
export enum LogLevel {
  SILLY = 0,
  TRACE = 1,
  DEBUG = 2,
  INFO = 3,
  WARN = 4,
  ERROR = 5,
  FATAL = 6,
}

// Helper function to get formatted timestamp
const getTimestamp = (): string => {
  const now = new Date();
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  const milliseconds = String(now.getMilliseconds()).padStart(3, '0');

  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}.${milliseconds}`;
};

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  silly: LogLevel.SILLY,
  trace: LogLevel.TRACE,
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  fatal: LogLevel.FATAL,
};

// Get current log level from environment variable, INFO when unset or unknown
const getCurrentLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase() ?? '';
  return LEVELS_BY_NAME[level] ?? LogLevel.INFO;
};

const shouldLog = (level: LogLevel): boolean => level >= getCurrentLogLevel();

type LogFn = (message: string, ...args: unknown[]) => void;

export interface Logger {
  silly: LogFn;
  trace: LogFn;
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  fatal: LogFn;
  child(context: string): Logger;
}

// Console-based logger with timestamps, level filtering and an optional [Context] tag
const createLogger = (context?: string): Logger => {
  const tag = context ? ` [${context}]` : '';
  const emit =
    (level: LogLevel, sink: (...data: unknown[]) => void): LogFn =>
    (message, ...args) => {
      if (shouldLog(level)) {
        sink(`${getTimestamp()} [${LogLevel[level]}]${tag} ${message}`, ...args);
      }
    };

  return {
    silly: emit(LogLevel.SILLY, console.debug),
    trace: emit(LogLevel.TRACE, console.debug),
    debug: emit(LogLevel.DEBUG, console.debug),
    info: emit(LogLevel.INFO, console.info),
    warn: emit(LogLevel.WARN, console.warn),
    error: emit(LogLevel.ERROR, console.error),
    fatal: emit(LogLevel.FATAL, console.error),
    child: (childContext: string) =>
      createLogger(context ? `${context}:${childContext}` : childContext),
  };
};

// Export the logger instance
export const log = createLogger();
