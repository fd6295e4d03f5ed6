/**
 * Timestamp helpers
 *
 * Delivery times travel as text (order files, settings, arguments) and are held
 * as luxon DateTime values in the UTC zone. Text without an offset is read as UTC.
 */

import { DateTime } from 'luxon';

const TIMESTAMP_ZONE = 'utc';

/**
 * Layout used for reference timestamps in the settings file
 */
export const SETTINGS_TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

/**
 * Zero/unset sentinel for delivery times (0001-01-01T00:00:00Z)
 */
export const UNSET_DELIVERY_TIME: DateTime = DateTime.fromObject(
  { year: 1, month: 1, day: 1 },
  { zone: TIMESTAMP_ZONE }
);

/**
 * Parse an ISO 8601 or `yyyy-MM-dd HH:mm:ss` timestamp.
 *
 * @returns the timestamp in UTC, or null when the text is not a timestamp
 */
export function parseTimestamp(text: string): DateTime | null {
  const trimmed = text.trim();
  if (trimmed === '') {
    return null;
  }

  const iso = DateTime.fromISO(trimmed, { zone: TIMESTAMP_ZONE });
  if (iso.isValid) {
    return iso;
  }

  const sql = DateTime.fromSQL(trimmed, { zone: TIMESTAMP_ZONE });
  return sql.isValid ? sql : null;
}

export function isUnsetDeliveryTime(value: DateTime): boolean {
  return value.toMillis() === UNSET_DELIVERY_TIME.toMillis();
}

/**
 * Serialize a timestamp for order files (`2024-10-30T09:00:00Z`)
 */
export function formatTimestamp(value: DateTime): string {
  return value.toUTC().toISO({ suppressMilliseconds: true }) ?? '';
}
