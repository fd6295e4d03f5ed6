/**
 * @delivery-filter/utils - Shared utilities package
 *
 * Logger, settings file loading and error classes.
 * No order file handling - that lives in @delivery-filter/storage
 */

// Logging
export {
  logger,
  Logger,
  LogLevel,
  createLogger,
  winstonLogger,
  useLogFile,
  flushLogger,
  serializeError,
  describeLoggedError,
  fileFormat,
  type LogContext,
  type LoggedError,
} from './logger.js';

// Settings
export * from './config/index.js';

// Error handling
export * from './errors.js';
