type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

/** Severity order, lowest first */
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

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

interface ConsoleLoggerOptions {
  /** Messages below this level are dropped (default: 'info') */
  level?: LogLevel;
  /** Target console, replaceable for tests */
  console?: Pick<Console, LogLevel>;
}

const noop: LogFn = () => {};

/**
 * Create a Logger that writes to the console, dropping every message
 * whose level is below `options.level`.
 */
function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { level = 'info', console: target = console } = options;
  const threshold = LOG_LEVELS.indexOf(level);

  const methodFor = (methodLevel: LogLevel): LogFn =>
    LOG_LEVELS.indexOf(methodLevel) >= threshold
      ? (...args) => target[methodLevel](...args)
      : noop;

  return new Logger({
    debug: methodFor('debug'),
    info: methodFor('info'),
    warn: methodFor('warn'),
    error: methodFor('error'),
  });
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export { LOG_LEVELS, Logger, createConsoleLogger, isLogLevel };
export type { ConsoleLoggerOptions, LogFn, LogLevel, LoggerMethods };
