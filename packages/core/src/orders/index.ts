export {
  validateOrders,
  checkOrder,
  findDuplicateOrderIds,
  orderSchema,
  ORDER_REJECTION_REASONS,
  MISSING_ORDER_ID_PLACEHOLDER,
  type OrderCheck,
} from './validate-orders.js';
export { filterOrders, DELIVERY_WINDOW } from './filter-orders.js';
