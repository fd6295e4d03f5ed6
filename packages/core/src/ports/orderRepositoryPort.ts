/**
 * Order Repository Port
 *
 * File-backed source and sink for order batches.
 * Handlers depend on this port, not on the JSON file adapter.
 */

import type { Order, RawOrder } from '../domain/orders/index.js';

export interface OrderRepositoryPort {
  /**
   * Load the records stored at `path`, unvalidated.
   *
   * Throws a not-found error when the path does not exist and a format error
   * when the content does not match the order schema.
   */
  loadOrders(path: string): RawOrder[];

  /**
   * Overwrite `path` with the given orders. Throws a write error on failure.
   */
  saveOrders(orders: readonly Order[], path: string): void;
}
