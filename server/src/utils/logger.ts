// Console logger shared by every server component.
// Output format: [SECURITY-API-<COMPONENT>][<iso timestamp>] message

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LoggerOptions {
  component: string;
  minLevel?: LogLevel;
}

export interface Logger {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
}

let defaultLevel: LogLevel = LogLevel.INFO;

export const parseLogLevel = (value: string | undefined): LogLevel => {
  switch ((value ?? '').toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
};

/**
 * Sets the level used by loggers created without an explicit `minLevel`.
 * Loggers read it on every call, so module-level loggers pick it up too.
 */
export const setDefaultLogLevel = (level: LogLevel): void => {
  defaultLevel = level;
};

export const createLogger = (options: LoggerOptions): Logger => {
  const { component, minLevel } = options;
  const prefix = `[SECURITY-API-${component.toUpperCase()}]`;

  const enabled = (level: LogLevel) => level >= (minLevel ?? defaultLevel);
  const format = (message: string) =>
    `${prefix}[${new Date().toISOString()}] ${message}`;

  const write = (
    level: LogLevel,
    sink: (...args: unknown[]) => void,
    message: string,
    data?: unknown
  ) => {
    if (!enabled(level)) return;
    if (data === undefined) {
      sink(format(message));
    } else {
      sink(format(message), data);
    }
  };

  return {
    debug: (message, data) => write(LogLevel.DEBUG, console.debug, message, data),
    info: (message, data) => write(LogLevel.INFO, console.log, message, data),
    warn: (message, data) => write(LogLevel.WARN, console.warn, message, data),
    error: (message, data) => write(LogLevel.ERROR, console.error, message, data),
  };
};

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
