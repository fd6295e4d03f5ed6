/**
 * Handlers Barrel Export
 *
 * Handlers are deterministic, testable, and depend only on ports.
 */

export {
  filterDeliveryOrdersHandler,
  type FilterDeliveryOrdersCommand,
  type FilterDeliveryOrdersHandlerPorts,
  type FilterDeliveryOrdersResult,
} from './filterDeliveryOrdersHandler.js';
