/**
 * Structured Logging System
 * =========================
 * Centralized logging using Winston. A console transport is always present;
 * each run adds a file transport for its delivery log via `useLogFile`.
 */

import * as winston from 'winston';

// Log levels
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
}

// Log context interface
export interface LogContext {
  orderId?: string | null;
  path?: string;
  [key: string]: unknown;
}

/**
 * Error as it is written into log entries
 */
export interface LoggedError {
  name: string;
  message: string;
  code?: string;
  comment?: string;
  stack?: string;
  cause?: LoggedError | string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Flatten an error (and its cause chain) into plain data for log entries
 */
export function serializeError(error: unknown): LoggedError | string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const serialized: LoggedError = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if ('code' in error && typeof error.code === 'string') {
    serialized.code = error.code;
  }
  if ('context' in error && isRecord(error.context) && typeof error.context.comment === 'string') {
    serialized.comment = error.context.comment;
  }
  if (error.cause !== undefined) {
    serialized.cause = serializeError(error.cause);
  }
  return serialized;
}

/**
 * Render a logged error as the lines that follow a file log entry
 */
export function describeLoggedError(error: unknown): string {
  if (!isRecord(error)) {
    return String(error);
  }

  const lines: string[] = [];
  const header = `${String(error.name ?? 'Error')}: ${String(error.message ?? '')}`;
  lines.push(typeof error.stack === 'string' ? error.stack : header);
  if (typeof error.code === 'string') {
    lines.push(`code: ${error.code}`);
  }
  if (error.cause !== undefined) {
    lines.push(`Caused by: ${describeLoggedError(error.cause)}`);
  }
  return lines.join('\n');
}

const level = process.env.LOG_LEVEL || 'info';

// Console format (human-readable)
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? '\n' + metaStr : ''}`;
  })
);

/**
 * Delivery log layout: `2024-10-30 09:00:00.000 WARN message`, error details on following lines
 */
export const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, error }) => {
    const line = `${String(timestamp)} ${level.toUpperCase()} ${String(message)}`;
    return error === undefined ? line : `${line}\n${describeLoggedError(error)}`;
  })
);

// Create Winston logger instance
const winstonLogger = winston.createLogger({
  level,
  defaultMeta: { service: 'delivery-filter' },
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      level,
      silent: process.env.NODE_ENV === 'test',
    }),
  ],
  exitOnError: false,
});

/**
 * Append entries at info level and above to `filename`.
 *
 * @returns a function that detaches the file transport again
 */
export function useLogFile(filename: string): () => void {
  const transport = new winston.transports.File({
    filename,
    level: LogLevel.INFO,
    format: fileFormat,
  });
  winstonLogger.add(transport);
  return () => {
    winstonLogger.remove(transport);
  };
}

/**
 * End the logger and wait until every transport has written its entries.
 * Call once, right before the process exits.
 */
export function flushLogger(): Promise<void> {
  return new Promise((resolve) => {
    winstonLogger.on('finish', () => resolve());
    winstonLogger.end();
  });
}

// Logger class with context support and package namespacing
class Logger {
  private context: LogContext = {};
  private namespace: string = 'delivery-filter';

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

  private mergeContext(additionalContext?: LogContext): LogContext {
    return {
      namespace: this.namespace,
      ...this.context,
      ...additionalContext,
    };
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const logContext = this.mergeContext(context);
    if (error === undefined) {
      winstonLogger.error(message, logContext);
    } else {
      winstonLogger.error(message, { ...logContext, error: serializeError(error) });
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.mergeContext(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.mergeContext(context));
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

// Default logger
export const logger = new Logger('delivery-filter');

export { Logger, winstonLogger };
