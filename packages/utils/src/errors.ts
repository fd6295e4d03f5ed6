/**
 * Custom Error Classes
 * ====================
 * Every failure that ends a run is one of these. Callers branch on the class
 * or on `code`, never on the message.
 */

export type ErrorCode =
  | 'APP_ERROR'
  | 'NOT_FOUND'
  | 'FORMAT_ERROR'
  | 'WRITE_ERROR'
  | 'INVALID_ARGUMENT';

/**
 * Extra data attached to an error. `comment` is the operator-facing
 * description logged at the top level.
 */
export interface ErrorContext {
  comment?: string;
  [key: string]: unknown;
}

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: ErrorContext;

  constructor(message: string, code: ErrorCode = 'APP_ERROR', context?: ErrorContext, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  get comment(): string | undefined {
    return this.context?.comment;
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
      stack: this.stack,
    };
  }
}

/**
 * Not found error - a file the run needs does not exist
 */
export class NotFoundError extends AppError {
  public readonly path: string;

  constructor(message: string, path: string, context?: ErrorContext) {
    super(message, 'NOT_FOUND', { path, ...context });
    this.path = path;
  }
}

/**
 * Format error - content is present but does not match the expected schema
 */
export class FormatError extends AppError {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super(message, 'FORMAT_ERROR', context, cause);
  }
}

/**
 * Write error - an output file could not be written
 */
export class WriteError extends AppError {
  public readonly path: string;

  constructor(path: string, cause: unknown, context?: ErrorContext) {
    super(`Failed to write file: ${path}`, 'WRITE_ERROR', { path, ...context }, cause);
    this.path = path;
  }
}

/**
 * Invalid argument error - a command-line token is not a known key=value pair
 */
export class InvalidArgumentError extends AppError {
  public readonly argument: string;

  constructor(message: string, argument: string, context?: ErrorContext) {
    super(message, 'INVALID_ARGUMENT', { argument, ...context });
    this.argument = argument;
  }
}

/**
 * Check if error is one of the expected failures that end a run
 */
export function isRunTerminatingError(
  error: unknown
): error is NotFoundError | FormatError | WriteError | InvalidArgumentError {
  return (
    error instanceof NotFoundError ||
    error instanceof FormatError ||
    error instanceof WriteError ||
    error instanceof InvalidArgumentError
  );
}
