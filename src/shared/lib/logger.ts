export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // grey
  info: '',
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
};

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
}

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  /** Derive a logger whose records always carry `defaults`; per-call data wins. */
  child(defaults: LogData): Logger;
}

function createLogger(options: LoggerOptions = {}, defaults: LogData = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? 'info'];
  const jsonMode = options.json ?? false;

  function log(level: LogLevel, message: string, data?: LogData) {
    if (LOG_LEVELS[level] < minLevel) return;

    const fields = { ...defaults, ...data };
    const hasFields = Object.keys(fields).length > 0;

    if (jsonMode) {
      const record = { level, message, timestamp: new Date().toISOString(), ...fields };
      process.stderr.write(JSON.stringify(record) + '\n');
      return;
    }

    const color = LEVEL_COLORS[level];
    const reset = color ? '\x1b[0m' : '';
    const suffix = hasFields ? ` ${JSON.stringify(fields)}` : '';
    process.stderr.write(`${color}[${level}]${reset} ${message}${suffix}\n`);
  }

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
    child: (more) => createLogger(options, { ...defaults, ...more }),
  };
}

let current = createLogger();

/**
 * Global logger. Child loggers taken from it resolve the active configuration
 * at call time, so `setLoggerOptions()` also affects children created earlier.
 */
export const logger: Logger = {
  debug: (msg, data) => current.debug(msg, data),
  info: (msg, data) => current.info(msg, data),
  warn: (msg, data) => current.warn(msg, data),
  error: (msg, data) => current.error(msg, data),
  child: (defaults) => scoped(defaults),
};

function scoped(defaults: LogData): Logger {
  return {
    debug: (msg, data) => current.debug(msg, { ...defaults, ...data }),
    info: (msg, data) => current.info(msg, { ...defaults, ...data }),
    warn: (msg, data) => current.warn(msg, { ...defaults, ...data }),
    error: (msg, data) => current.error(msg, { ...defaults, ...data }),
    child: (more) => scoped({ ...defaults, ...more }),
  };
}

export function setLoggerOptions(options: LoggerOptions): void {
  current = createLogger(options);
}
