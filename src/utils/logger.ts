/**
 * Structured logging utility for export delivery
 * Emits one JSON line per entry, tagged with a correlation ID when one is known
 */

import { environmentConfig } from "../config/environment";
import type { LogLevelName } from "../types/environment";

export interface LogContext {
  correlationId?: string;
  exporter?: string;
  filename?: string;
  operation?: string;
  [key: string]: unknown;
}

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

/**
 * Structured logger class with correlation ID support
 */
export class Logger {
  private readonly serviceName: string;
  private readonly defaultContext: LogContext;
  private readonly minLevel: LogLevelName;

  constructor(
    serviceName: string = "TabularExport",
    defaultContext: LogContext = {},
    minLevel: LogLevelName = environmentConfig.logLevel,
  ) {
    this.serviceName = serviceName;
    this.defaultContext = defaultContext;
    this.minLevel = minLevel;
  }

  /**
   * Creates a child logger with additional default context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger(
      this.serviceName,
      { ...this.defaultContext, ...additionalContext },
      this.minLevel,
    );
  }

  debug(message: string, context: LogContext = {}): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context: LogContext = {}): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context: LogContext = {}): void {
    this.log(LogLevel.WARN, message, context);
  }

  /**
   * Logs an error message, flattening the error into the entry
   */
  error(message: string, error?: Error, context: LogContext = {}): void {
    const errorContext = error
      ? {
          error: {
            name: error.name,
            message: error.message,
            stack: error.stack,
          },
        }
      : {};

    this.log(LogLevel.ERROR, message, { ...context, ...errorContext });
  }

  private log(level: LogLevel, message: string, context: LogContext): void {
    if (SEVERITY[level] < SEVERITY[LogLevel[this.minLevel]]) {
      return;
    }

    const logOutput = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      service: this.serviceName,
      message,
      ...this.defaultContext,
      ...context,
    });

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(logOutput);
        break;
      case LogLevel.INFO:
        console.info(logOutput);
        break;
      case LogLevel.WARN:
        console.warn(logOutput);
        break;
      case LogLevel.ERROR:
        console.error(logOutput);
        break;
    }
  }
}

/**
 * Default logger instance
 */
export const logger = new Logger("TabularExport");

/**
 * Creates a logger with correlation ID context
 */
export function createCorrelatedLogger(
  correlationId: string,
  additionalContext: LogContext = {},
): Logger {
  return logger.child({ correlationId, ...additionalContext });
}
