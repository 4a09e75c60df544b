/**
 * Structured Logging System
 * =========================
 * Centralized logging using Winston with structured output and context
 * propagation. Console output goes to stderr so stdout stays free for
 * command results.
 */

import * as winston from 'winston';
import { resolveLoggingConfig } from './config/index.js';

// Log levels
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
  TRACE = 'trace',
}

// Log context interface
export interface LogContext {
  xid?: string;
  wid?: number;
  path?: string;
  method?: string;
  [key: string]: unknown;
}

const loggingConfig = resolveLoggingConfig();

// Custom format for structured logging
const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Console format for development (human-readable)
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? ' ' + metaStr : ''}`;
  })
);

const winstonLogger = winston.createLogger({
  // Winston has no trace level; trace messages are written at debug
  level: loggingConfig.level === LogLevel.TRACE ? LogLevel.DEBUG : loggingConfig.level,
  format: structuredFormat,
  defaultMeta: { service: 'windmill' },
  transports: [
    new winston.transports.Console({
      format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    }),
  ],
  silent: !loggingConfig.console,
  exitOnError: false,
});

if (loggingConfig.rejectedLevel !== undefined) {
  winstonLogger.warn(`Unknown LOG_LEVEL '${loggingConfig.rejectedLevel}', using info`, {
    namespace: 'windmill',
  });
}

// Logger class with context support and package namespacing
class Logger {
  private context: LogContext = {};
  private namespace: string = 'windmill';

  constructor(namespace?: string) {
    if (namespace) {
      this.namespace = namespace;
    }
  }

  /**
   * Set context that will be included in all subsequent log messages
   */
  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  getContext(): LogContext {
    return { ...this.context };
  }

  getNamespace(): string {
    return this.namespace;
  }

  private mergeContext(additionalContext?: LogContext): LogContext {
    return {
      namespace: this.namespace,
      ...this.context,
      ...additionalContext,
    };
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const logContext = this.mergeContext(context);

    if (error instanceof Error) {
      winstonLogger.error(message, {
        ...logContext,
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
      });
    } else if (error) {
      winstonLogger.error(message, { ...logContext, error });
    } else {
      winstonLogger.error(message, logContext);
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.mergeContext(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.mergeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.mergeContext(context));
  }

  trace(message: string, context?: LogContext): void {
    if (loggingConfig.level !== LogLevel.TRACE) return;
    winstonLogger.debug(message, { ...this.mergeContext(context), trace: true });
  }

  /**
   * Create a child logger with persistent context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.namespace);
    childLogger.setContext({ ...this.context, ...context });
    return childLogger;
  }
}

// Factory function to create package-specific loggers
export function createLogger(packageName: string): Logger {
  return new Logger(packageName);
}

export const logger = new Logger('windmill');

export { Logger };

export { winstonLogger };
