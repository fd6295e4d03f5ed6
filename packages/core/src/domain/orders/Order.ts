/**
 * Order - a delivery order in a batch
 *
 * Orders are built once when the batch is read and never mutated afterwards.
 * Identity is the batch-local `orderId`; nothing is kept between runs.
 */

import type { DateTime } from 'luxon';

/**
 * Order record exactly as stored in an orders file.
 *
 * Absent fields are null. Nothing has been checked yet.
 */
export type RawOrder = {
  readonly orderId: string | null;
  readonly weight: number | null;
  readonly district: string | null;
  readonly deliveryTime: DateTime | null;
};

/**
 * Validated order: unique non-empty id, positive weight, non-empty district,
 * delivery time set.
 */
export type Order = {
  readonly orderId: string;
  readonly weight: number;
  readonly district: string;
  readonly deliveryTime: DateTime;
};
