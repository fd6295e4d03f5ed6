import { Duration, type DateTime } from 'luxon';
import type { Order } from '../domain/orders/index.js';

/**
 * Length of the delivery window that starts at the reference timestamp
 */
export const DELIVERY_WINDOW: Duration = Duration.fromObject({ minutes: 30 });

/**
 * Select the orders of `district` delivered within [windowStart, windowStart + 30 min],
 * both bounds included, sorted by delivery time. Ties keep their input order.
 */
export function filterOrders(
  orders: readonly Order[],
  district: string,
  windowStart: DateTime
): Order[] {
  const fromMs = windowStart.toMillis();
  const toMs = windowStart.plus(DELIVERY_WINDOW).toMillis();

  return orders
    .filter((order) => {
      const deliveryMs = order.deliveryTime.toMillis();
      return order.district === district && deliveryMs >= fromMs && deliveryMs <= toMs;
    })
    .sort((a, b) => a.deliveryTime.toMillis() - b.deliveryTime.toMillis());
}
