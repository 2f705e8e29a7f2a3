/**
 * Log levels enum
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR'
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

const REDACTED_KEYS = ['password', 'token'];

interface LoggerOptions {
  module: string;
  level?: LogLevel;
}

export interface Logger {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, error?: unknown) => void;
}

const isLogLevel = (value: string): value is LogLevel =>
  Object.values(LogLevel).some((level) => level === value);

/**
 * Resolve the minimum level from LOG_LEVEL, falling back to INFO
 */
export const resolveLogLevel = (value: string | undefined = process.env.LOG_LEVEL): LogLevel => {
  const upper = (value || '').toUpperCase();
  return isLogLevel(upper) ? upper : LogLevel.INFO;
};

/**
 * Stringify log data, redacting secrets and marking circular references
 */
export const stringifyLogData = (data: unknown): string => {
  if (typeof data !== 'object' || data === null) {
    return String(data);
  }

  try {
    const seen = new WeakSet<object>();
    return JSON.stringify(data, (key, value: unknown) => {
      if (REDACTED_KEYS.includes(key)) return '[REDACTED]';
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return '[Circular]';
        seen.add(value);
      }
      return value;
    }, 2);
  } catch (err) {
    return '[Unable to stringify data]';
  }
};

/**
 * Logger utility for application-wide logging
 */
export const logger = (options: LoggerOptions): Logger => {
  const { module, level } = options;

  /**
   * Format log message with timestamp, module name and log level
   */
  const formatMessage = (messageLevel: LogLevel, message: string, data?: unknown): string => {
    const timestamp = new Date().toISOString();
    let formattedMessage = `[${timestamp}] [${messageLevel}] [${module}] ${message}`;

    if (data !== undefined) {
      formattedMessage += `\nData: ${stringifyLogData(data)}`;
    }

    return formattedMessage;
  };

  // LOG_LEVEL is read per call: module loggers exist before dotenv runs
  const enabled = (messageLevel: LogLevel): boolean =>
    LEVEL_ORDER[messageLevel] >= LEVEL_ORDER[level ?? resolveLogLevel()];

  return {
    debug: (message, data) => {
      if (enabled(LogLevel.DEBUG)) console.debug(formatMessage(LogLevel.DEBUG, message, data));
    },

    info: (message, data) => {
      if (enabled(LogLevel.INFO)) console.info(formatMessage(LogLevel.INFO, message, data));
    },

    warn: (message, data) => {
      if (enabled(LogLevel.WARN)) console.warn(formatMessage(LogLevel.WARN, message, data));
    },

    error: (message, error) => {
      if (!enabled(LogLevel.ERROR)) return;

      // Extract stack trace and other details if it's an Error object
      const data = error instanceof Error
        ? { ...error, name: error.name, message: error.message, stack: error.stack }
        : error;

      console.error(formatMessage(LogLevel.ERROR, message, data));
    },
  };
};

/**
 * Export a simple function to create loggers with less boilerplate
 */
export const createLogger = (module: string, options: Partial<Omit<LoggerOptions, 'module'>> = {}): Logger => {
  return logger({
    module,
    ...options
  });
};
