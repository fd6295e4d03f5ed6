/**
 * Logger Port
 *
 * Minimal logging capability the pipeline depends on. The utils Logger
 * satisfies it; tests pass doubles.
 */
export interface LoggerPort {
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
}
