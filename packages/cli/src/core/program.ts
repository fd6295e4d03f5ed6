/**
 * Commander program for the delivery-filter CLI
 */

import { Command } from 'commander';
import { DEFAULT_SETTINGS_PATH } from '@delivery-filter/utils';
import { RUN_ARGUMENT_KEYS } from './argument-parser.js';

export type ProgramOptions = {
  config: string;
};

export type RunAction = (assignments: string[], options: ProgramOptions) => void;

export function buildProgram(run: RunAction): Command {
  const program = new Command();

  program
    .name('delivery-filter')
    .description(
      'Validate a batch of delivery orders and write the ones due in a 30-minute window for one district'
    )
    .version('1.0.0')
    .argument(
      '[assignments...]',
      `run overrides as key=value (${RUN_ARGUMENT_KEYS.join('=, ')}=)`,
      []
    )
    .option(
      '-c, --config <path>',
      'settings file, created with defaults when missing',
      DEFAULT_SETTINGS_PATH
    )
    .action((assignments: string[], options: ProgramOptions) => {
      run(assignments, options);
    });

  program.addHelpText(
    'after',
    '\nExamples:\n  delivery-filter _cityDistrict=District_1 "_firstDeliveryDateTime=2024-10-30 09:00:00"'
  );

  return program;
}
