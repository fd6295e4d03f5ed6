#!/usr/bin/env tsx

/**
 * delivery-filter CLI Entry Point
 */

import { logger } from '@delivery-filter/utils';
import { runCli } from '../core/run-cli.js';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error('Unhandled error in CLI', error);
    process.exit(1);
  });
