const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

type LogFn = (...args: unknown[]) => void;

type LogLevel = (typeof LOG_LEVELS)[number];

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

interface ConsoleLoggerOptions {
  /** Lowest level that is written (default: 'info') */
  level?: LogLevel;
  /** Sink for the formatted lines (default: global console) */
  sink?: Pick<Console, LogLevel>;
}

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }
}

/**
 * Build a Logger that writes to the console, dropping every call below
 * `level`.
 */
function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const sink = options.sink ?? console;

  const method =
    (level: LogLevel): LogFn =>
    (...args) => {
      if (LOG_LEVELS.indexOf(level) < threshold) return;
      sink[level](...args);
    };

  return new Logger({
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
  });
}

export { LOG_LEVELS, Logger, createConsoleLogger };
export type { ConsoleLoggerOptions, LogFn, LogLevel, LoggerMethods };
