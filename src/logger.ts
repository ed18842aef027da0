type LogFn = (...args: unknown[]) => void;

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

/** Sink for progress and summary messages. Informational only. */
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

function createConsoleLogger(options?: { verbose?: boolean }): Logger {
  const noop: LogFn = () => {};
  return new Logger({
    debug: options?.verbose ? console.debug.bind(console) : noop,
    info: console.log.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
  });
}

function createSilentLogger(): Logger {
  const noop: LogFn = () => {};
  return new Logger({ debug: noop, info: noop, warn: noop, error: noop });
}

export { Logger, createConsoleLogger, createSilentLogger };
export type { LoggerMethods, LogFn };
