/**
 * Error Handler - top-level reporting for failed runs
 */

import { isRunTerminatingError, logger, serializeError, type Logger } from '@delivery-filter/utils';

export type ErrorLogger = Pick<Logger, 'warn' | 'error'>;

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (isRunTerminatingError(error)) {
    return error.comment ? `${error.comment}: ${error.message}` : error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'An unexpected error occurred';
}

/**
 * Log the error with its comment and cause, and return the message for the terminal.
 *
 * Expected run failures are logged as warnings, anything else as an error.
 */
export function handleError(error: unknown, log: ErrorLogger = logger): string {
  if (isRunTerminatingError(error)) {
    log.warn(error.comment ?? error.message, {
      code: error.code,
      error: serializeError(error),
    });
  } else {
    log.error('Unexpected error during run', error);
  }
  return formatError(error);
}
