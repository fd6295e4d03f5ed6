/**
 * CLI entry logic - parses the command line, runs one pass and maps failures to an exit code.
 */

import { flushLogger, logger } from '@delivery-filter/utils';
import { handleError, type ErrorLogger } from './error-handler.js';
import { buildProgram } from './program.js';
import { runApplication, type RunApplicationDeps } from './run-application.js';

export type RunCliDeps = {
  application: Partial<Omit<RunApplicationDeps, 'settingsPath'>>;
  errorLogger: ErrorLogger;
  /** Wait for log transports before exit */
  flush: () => Promise<void>;
  writeError: (line: string) => void;
};

/**
 * @returns the process exit code: 0 when the run ended, 1 when it failed
 */
export async function runCli(
  argv: readonly string[],
  deps: Partial<RunCliDeps> = {}
): Promise<number> {
  const {
    application = {},
    errorLogger = logger,
    flush = flushLogger,
    writeError = (line: string) => console.error(line),
  } = deps;

  const program = buildProgram((assignments, options) => {
    runApplication(assignments, { ...application, settingsPath: options.config });
  });

  try {
    program.parse([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    writeError(`Error: ${handleError(error, errorLogger)}`);
    return 1;
  } finally {
    await flush();
  }
}
