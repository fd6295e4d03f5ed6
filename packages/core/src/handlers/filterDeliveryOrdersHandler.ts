import type { DateTime } from 'luxon';
import type { LoggerPort } from '../ports/loggerPort.js';
import type { OrderRepositoryPort } from '../ports/orderRepositoryPort.js';
import { filterOrders } from '../orders/filter-orders.js';
import { validateOrders } from '../orders/validate-orders.js';

export type FilterDeliveryOrdersCommand = {
  ordersFilePath: string;
  outputFilePath: string;
  district: string;
  windowStart: DateTime;
};

export type FilterDeliveryOrdersHandlerPorts = {
  orders: OrderRepositoryPort;
  logger: LoggerPort;
};

export type FilterDeliveryOrdersResult =
  | { status: 'completed'; loaded: number; valid: number; selected: number }
  | { status: 'no_valid_orders'; loaded: number };

/**
 * Read -> validate -> filter -> write.
 *
 * A batch without valid orders is a normal outcome: it is logged and the output
 * file is left untouched. Repository errors propagate to the caller.
 */
export function filterDeliveryOrdersHandler(
  cmd: FilterDeliveryOrdersCommand,
  ports: FilterDeliveryOrdersHandlerPorts
): FilterDeliveryOrdersResult {
  const rawOrders = ports.orders.loadOrders(cmd.ordersFilePath);
  const validOrders = validateOrders(rawOrders, ports.logger);

  if (validOrders.length === 0) {
    ports.logger.warn(`No valid orders found in file: ${cmd.ordersFilePath}`, {
      loaded: rawOrders.length,
    });
    return { status: 'no_valid_orders', loaded: rawOrders.length };
  }

  const selected = filterOrders(validOrders, cmd.district, cmd.windowStart);
  ports.orders.saveOrders(selected, cmd.outputFilePath);

  ports.logger.info(
    `Found ${selected.length} valid orders for district ${cmd.district} in file: ${cmd.ordersFilePath}.`,
    { loaded: rawOrders.length, valid: validOrders.length, outputFilePath: cmd.outputFilePath }
  );

  return {
    status: 'completed',
    loaded: rawOrders.length,
    valid: validOrders.length,
    selected: selected.length,
  };
}
