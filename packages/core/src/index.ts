/**
 * @delivery-filter/core
 *
 * Order model, validation and filtering pipeline, and the ports it runs on.
 * This package has no dependencies on other @delivery-filter packages.
 */

export * from './domain/orders/index.js';
export * from './ports/index.js';
export * from './orders/index.js';
export * from './handlers/index.js';
export {
  parseTimestamp,
  formatTimestamp,
  isUnsetDeliveryTime,
  UNSET_DELIVERY_TIME,
  SETTINGS_TIMESTAMP_FORMAT,
} from './time/timestamps.js';
