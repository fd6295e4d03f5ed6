/**
 * Order Validation
 *
 * Drops every order whose id occurs more than once in the batch, then checks
 * the remaining ones field by field. All failing fields of an order are
 * reported together in a single warning.
 */

import { DateTime } from 'luxon';
import { z } from 'zod';
import type { Order, RawOrder } from '../domain/orders/index.js';
import type { LoggerPort } from '../ports/loggerPort.js';
import { isUnsetDeliveryTime } from '../time/timestamps.js';

export const MISSING_ORDER_ID_PLACEHOLDER = '(not specified)';

export const ORDER_REJECTION_REASONS = {
  orderId: 'Invalid order identifier.',
  weight: 'Invalid order weight (must be greater than 0).',
  district: 'Invalid order district.',
  deliveryTime: 'Invalid delivery time.',
} as const;

const requiredString = (message: string) =>
  z.string({ required_error: message, invalid_type_error: message }).min(1, message);

/**
 * Field constraints of a valid order, in reporting order
 */
export const orderSchema = z.object({
  orderId: requiredString(ORDER_REJECTION_REASONS.orderId),
  weight: z
    .number({
      required_error: ORDER_REJECTION_REASONS.weight,
      invalid_type_error: ORDER_REJECTION_REASONS.weight,
    })
    .positive(ORDER_REJECTION_REASONS.weight)
    .finite(ORDER_REJECTION_REASONS.weight),
  district: requiredString(ORDER_REJECTION_REASONS.district),
  deliveryTime: z.custom<DateTime>(
    (value) => DateTime.isDateTime(value) && value.isValid && !isUnsetDeliveryTime(value),
    { message: ORDER_REJECTION_REASONS.deliveryTime }
  ),
});

export type OrderCheck = { ok: true; order: Order } | { ok: false; reasons: string[] };

/**
 * Check one order against every field constraint without stopping at the first failure.
 */
export function checkOrder(raw: RawOrder): OrderCheck {
  const parsed = orderSchema.safeParse(raw);
  if (parsed.success) {
    return { ok: true, order: parsed.data };
  }
  return { ok: false, reasons: parsed.error.issues.map((issue) => issue.message) };
}

function describeOrderId(orderId: string | null): string {
  return orderId ? orderId : MISSING_ORDER_ID_PLACEHOLDER;
}

/**
 * Ids that occur more than once, in order of first appearance
 */
export function findDuplicateOrderIds(orders: readonly RawOrder[]): Array<string | null> {
  const counts = new Map<string | null, number>();
  for (const order of orders) {
    counts.set(order.orderId, (counts.get(order.orderId) ?? 0) + 1);
  }
  return [...counts].filter(([, count]) => count > 1).map(([orderId]) => orderId);
}

/**
 * Keep the orders that are unique by id and pass every field constraint.
 *
 * Rejections are reported through `logger.warn`; nothing is thrown for bad data.
 * The result keeps the input order and may be empty.
 */
export function validateOrders(orders: readonly RawOrder[], logger: LoggerPort): Order[] {
  const duplicateIds = new Set(findDuplicateOrderIds(orders));
  for (const orderId of duplicateIds) {
    logger.warn(`Duplicate order identifier: ${describeOrderId(orderId)}`, { orderId });
  }

  const validOrders: Order[] = [];
  const rejections: Array<{ orderId: string | null; reasons: string[] }> = [];

  for (const raw of orders) {
    if (duplicateIds.has(raw.orderId)) {
      continue;
    }
    const check = checkOrder(raw);
    if (check.ok) {
      validOrders.push(check.order);
    } else {
      rejections.push({ orderId: raw.orderId, reasons: check.reasons });
    }
  }

  for (const { orderId, reasons } of rejections) {
    logger.warn(`Order ID ${describeOrderId(orderId)}: ${reasons.join(', ')}`, { orderId });
  }

  return validOrders;
}
