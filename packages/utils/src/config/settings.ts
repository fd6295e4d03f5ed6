/**
 * Settings File Loader
 * ====================
 * Loads run defaults from a JSON settings file. A missing (or `null`) file is
 * replaced by a freshly written one with default values.
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { z } from 'zod';
import { SETTINGS_TIMESTAMP_FORMAT, type ClockPort, type LoggerPort } from '@delivery-filter/core';
import { FormatError, WriteError } from '../errors.js';
import { logger } from '../logger.js';

export const DEFAULT_SETTINGS_PATH = 'config.json';

export interface Settings {
  readonly defaultCityDistrict: string;
  readonly defaultFirstDeliveryDateTime: string;
  readonly defaultDeliveryLogPath: string;
  readonly defaultDeliveryOrderPath: string;
  readonly ordersFilePath: string;
}

const settingValue = z.string().nullish();

/**
 * Settings as stored. Missing, null or empty keys fall back to defaults.
 */
export const storedSettingsSchema = z
  .object({
    defaultCityDistrict: settingValue,
    defaultFirstDeliveryDateTime: settingValue,
    defaultDeliveryLogPath: settingValue,
    defaultDeliveryOrderPath: settingValue,
    ordersFilePath: settingValue,
  })
  .nullable();

export type StoredSettings = z.infer<typeof storedSettingsSchema>;

export function createDefaultSettings(clock: ClockPort): Settings {
  return {
    defaultCityDistrict: 'DefaultDistrict',
    defaultFirstDeliveryDateTime: clock.now().toFormat(SETTINGS_TIMESTAMP_FORMAT),
    defaultDeliveryLogPath: 'deliveryLog.log',
    defaultDeliveryOrderPath: 'filteredOrders.json',
    ordersFilePath: 'orders.json',
  };
}

/**
 * Write settings as indented JSON, replacing the file
 */
export function saveSettings(path: string, settings: Settings): Settings {
  try {
    writeFileSync(path, JSON.stringify(settings, null, 2) + '\n', 'utf-8');
  } catch (error) {
    throw new WriteError(path, error, { comment: 'Failed to save settings' });
  }
  return settings;
}

function withDefaults(stored: NonNullable<StoredSettings>, defaults: Settings): Settings {
  const pick = (value: string | null | undefined, fallback: string) => (value ? value : fallback);
  return {
    defaultCityDistrict: pick(stored.defaultCityDistrict, defaults.defaultCityDistrict),
    defaultFirstDeliveryDateTime: pick(
      stored.defaultFirstDeliveryDateTime,
      defaults.defaultFirstDeliveryDateTime
    ),
    defaultDeliveryLogPath: pick(stored.defaultDeliveryLogPath, defaults.defaultDeliveryLogPath),
    defaultDeliveryOrderPath: pick(
      stored.defaultDeliveryOrderPath,
      defaults.defaultDeliveryOrderPath
    ),
    ordersFilePath: pick(stored.ordersFilePath, defaults.ordersFilePath),
  };
}

/**
 * Load settings from `path`, creating the file when it does not exist.
 *
 * @throws FormatError when the file is not valid JSON or a key has the wrong type
 */
export function loadSettings(
  path: string,
  clock: ClockPort,
  log: LoggerPort = logger
): Settings {
  const defaults = createDefaultSettings(clock);

  if (!existsSync(path)) {
    log.info('Settings file not found, created a new one', { path });
    return saveSettings(path, defaults);
  }

  const text = readFileSync(path, 'utf-8');
  let content: unknown;
  try {
    content = JSON.parse(text);
  } catch (error) {
    throw new FormatError(
      `Settings file is not valid JSON: ${path}`,
      { comment: 'Failed to deserialize settings', path },
      error
    );
  }

  const parsed = storedSettingsSchema.safeParse(content);
  if (!parsed.success) {
    throw new FormatError(
      `Settings file does not match the settings schema: ${path}`,
      {
        comment: 'Failed to deserialize settings',
        path,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      },
      parsed.error
    );
  }

  if (parsed.data === null) {
    log.warn('Loaded settings are empty, created new ones', { path });
    return saveSettings(path, defaults);
  }

  return withDefaults(parsed.data, defaults);
}
