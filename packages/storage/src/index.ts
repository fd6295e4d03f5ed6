/**
 * @delivery-filter/storage
 *
 * File-backed storage for order batches.
 */

export {
  JsonOrderFileRepository,
  loadOrders,
  saveOrders,
  toOrderRecord,
  orderRecordSchema,
  orderFileSchema,
  type OrderRecord,
} from './repositories/json-order-file-repository.js';
