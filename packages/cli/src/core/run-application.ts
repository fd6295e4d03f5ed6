/**
 * Run orchestration - resolves settings and arguments, then runs the order pipeline.
 *
 * Composition root: the production ports are created here unless replaced through deps.
 */

import type { DateTime } from 'luxon';
import {
  createSystemClock,
  filterDeliveryOrdersHandler,
  parseTimestamp,
  SETTINGS_TIMESTAMP_FORMAT,
  type ClockPort,
  type FilterDeliveryOrdersResult,
  type LoggerPort,
  type OrderRepositoryPort,
} from '@delivery-filter/core';
import { JsonOrderFileRepository } from '@delivery-filter/storage';
import { createLogger, DEFAULT_SETTINGS_PATH, loadSettings, useLogFile } from '@delivery-filter/utils';
import { assertValidRunArguments, getArgumentValue, parseRunArguments } from './argument-parser.js';

export type RunApplicationDeps = {
  settingsPath: string;
  clock: ClockPort;
  logger: LoggerPort;
  orders: OrderRepositoryPort;
  /** Attach the run's delivery log file; returns a detach function */
  attachLogFile: (path: string) => () => void;
};

export type RunOutcome =
  | FilterDeliveryOrdersResult
  | { status: 'invalid_first_delivery_time'; value: string };

const cliLogger = createLogger('cli');

export function describeRunStart(argv: readonly string[], startedAt: DateTime): string {
  const timestamp = startedAt.toFormat(SETTINGS_TIMESTAMP_FORMAT);
  return argv.length > 0
    ? `Run started ${timestamp}, arguments: ${argv.join(',\n')}`
    : `Run started ${timestamp}, no arguments passed`;
}

/**
 * Run one filtering pass.
 *
 * The log file is attached before the arguments are checked, so a malformed
 * argument is reported in the delivery log too.
 *
 * @throws NotFoundError, FormatError, WriteError, InvalidArgumentError
 */
export function runApplication(
  argv: readonly string[],
  deps: Partial<RunApplicationDeps> = {}
): RunOutcome {
  const {
    settingsPath = DEFAULT_SETTINGS_PATH,
    clock = createSystemClock(),
    logger = cliLogger,
    orders = new JsonOrderFileRepository(),
    attachLogFile = useLogFile,
  } = deps;

  const settings = loadSettings(settingsPath, clock, logger);

  const parsed = parseRunArguments(argv);
  attachLogFile(getArgumentValue(parsed.values, '_deliveryLog', settings.defaultDeliveryLogPath));
  logger.info(describeRunStart(argv, clock.now()));

  const args = assertValidRunArguments(parsed);
  const district = getArgumentValue(args, '_cityDistrict', settings.defaultCityDistrict);
  const firstDeliveryDateTime = getArgumentValue(
    args,
    '_firstDeliveryDateTime',
    settings.defaultFirstDeliveryDateTime
  );

  const windowStart = parseTimestamp(firstDeliveryDateTime);
  if (windowStart === null) {
    logger.warn('Invalid first delivery time format.', { value: firstDeliveryDateTime });
    return { status: 'invalid_first_delivery_time', value: firstDeliveryDateTime };
  }

  return filterDeliveryOrdersHandler(
    {
      ordersFilePath: settings.ordersFilePath,
      outputFilePath: getArgumentValue(args, '_deliveryOrder', settings.defaultDeliveryOrderPath),
      district,
      windowStart,
    },
    { orders, logger }
  );
}
