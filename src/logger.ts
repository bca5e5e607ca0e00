import winston from "winston";

type LogContext = Record<string, unknown>;

interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

interface LoggerOptions {
  verbose?: boolean;
  silent?: boolean;
}

const LEVELS = ["error", "warn", "info", "debug"];

const lineFormat = winston.format.printf((info) => {
  const { level, message, timestamp, ...context } = info;
  const base = `${String(timestamp)} - ${level.toUpperCase()} - ${String(message)}`;
  return Object.keys(context).length > 0
    ? `${base} ${JSON.stringify(context)}`
    : base;
});

class WinstonLogger implements Logger {
  private readonly inner: winston.Logger;

  constructor(options: LoggerOptions = {}) {
    this.inner = winston.createLogger({
      level: options.verbose ? "debug" : "info",
      silent: options.silent ?? false,
      format: winston.format.combine(
        winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss,SSS" }),
        lineFormat,
      ),
      // everything goes to stderr; stdout is left for results
      transports: [new winston.transports.Console({ stderrLevels: LEVELS })],
    });
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log("error", message, context);
  }

  private log(level: string, message: string, context?: LogContext): void {
    if (context) {
      this.inner.log(level, message, context);
    } else {
      this.inner.log(level, message);
    }
  }
}

function createLogger(options: LoggerOptions = {}): Logger {
  return new WinstonLogger(options);
}

const silentLogger: Logger = createLogger({ silent: true });

export { createLogger, silentLogger, WinstonLogger };
export type { LogContext, Logger, LoggerOptions };
