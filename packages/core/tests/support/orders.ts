import { vi } from 'vitest';
import { DateTime } from 'luxon';
import type { Order, RawOrder } from '../../src/index.js';

export const at = (iso: string): DateTime => DateTime.fromISO(iso, { zone: 'utc' });

export function rawOrder(overrides: Partial<RawOrder> = {}): RawOrder {
  return {
    orderId: 'Order_1',
    weight: 5,
    district: 'District_1',
    deliveryTime: at('2024-10-30T09:00:00'),
    ...overrides,
  };
}

export function order(overrides: Partial<Order> = {}): Order {
  return {
    orderId: 'Order_1',
    weight: 5,
    district: 'District_1',
    deliveryTime: at('2024-10-30T09:00:00'),
    ...overrides,
  };
}

export function createLoggerDouble() {
  return { warn: vi.fn(), info: vi.fn() };
}
