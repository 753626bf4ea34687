import { AsyncLocalStorage } from "async_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

type LogContext = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  correlationId?: string;
  context?: LogContext;
  error?: Error;
}

interface CorrelationContext {
  correlationId: string;
}

/**
 * AsyncLocalStorage for correlation ID
 * Lets every log line written while handling a request carry that request's ID
 */
const asyncLocalStorage = new AsyncLocalStorage<CorrelationContext>();

/**
 * Set correlation ID in async context
 * Called by correlation-id middleware for each request
 */
export function setCorrelationId(correlationId: string): void {
  asyncLocalStorage.enterWith({ correlationId });
}

export function getCorrelationId(): string | undefined {
  return asyncLocalStorage.getStore()?.correlationId;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as string[]).includes(value);
}

class Logger {
  private logLevel: LogLevel;

  constructor() {
    const envLevel = (process.env.LOG_LEVEL || "info").toLowerCase();
    this.logLevel = isLogLevel(envLevel) ? envLevel : "info";
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.logLevel);
  }

  private formatLog(entry: LogEntry): string {
    const { timestamp, level, message, correlationId, context, error } = entry;
    let log = `[${timestamp}] [${level.toUpperCase()}]`;

    if (correlationId) {
      log += ` [${correlationId}]`;
    }

    log += ` ${message}`;

    if (context && Object.keys(context).length > 0) {
      log += ` ${JSON.stringify(context)}`;
    }

    if (error) {
      log += `\n${error.stack ?? error.message}`;
    }

    return log;
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error) {
    if (!this.shouldLog(level)) return;

    const formatted = this.formatLog({
      timestamp: new Date().toISOString(),
      level,
      message,
      correlationId: getCorrelationId(),
      context,
      error,
    });

    switch (level) {
      case "debug":
        console.debug(formatted);
        break;
      case "info":
        console.info(formatted);
        break;
      case "warn":
        console.warn(formatted);
        break;
      case "error":
        console.error(formatted);
        break;
    }
  }

  debug(message: string, context?: LogContext) {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext) {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext) {
    this.log("warn", message, context);
  }

  error(message: string, context?: LogContext, error?: Error) {
    this.log("error", message, context, error);
  }
}

export const logger = new Logger();
