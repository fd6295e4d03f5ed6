/**
 * JSON Order File Repository
 *
 * Reads and writes order batches as JSON arrays of
 * `{ orderId, weight, district, deliveryTime }`.
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { z } from 'zod';
import {
  formatTimestamp,
  parseTimestamp,
  type Order,
  type OrderRepositoryPort,
  type RawOrder,
} from '@delivery-filter/core';
import { FormatError, NotFoundError, WriteError } from '@delivery-filter/utils';

/**
 * One stored order. Fields may be missing or null; types must still match.
 */
export const orderRecordSchema = z.object({
  orderId: z.string().nullish(),
  weight: z.number().finite().nullish(),
  district: z.string().nullish(),
  deliveryTime: z
    .string()
    .nullish()
    .transform((value, ctx) => {
      if (value === null || value === undefined) {
        return null;
      }
      const timestamp = parseTimestamp(value);
      if (timestamp === null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unparseable delivery time: ${value}`,
        });
        return z.NEVER;
      }
      return timestamp;
    }),
});

export const orderFileSchema = z.array(orderRecordSchema);

export type OrderRecord = {
  orderId: string;
  weight: number;
  district: string;
  deliveryTime: string;
};

export function toOrderRecord(order: Order): OrderRecord {
  return {
    orderId: order.orderId,
    weight: order.weight,
    district: order.district,
    deliveryTime: formatTimestamp(order.deliveryTime),
  };
}

/**
 * Load the orders stored at `path`, exactly as stored.
 *
 * @throws NotFoundError when the file does not exist
 * @throws FormatError when the content is not a JSON array of order records
 *   (a weight that overflows to Infinity included)
 */
export function loadOrders(path: string): RawOrder[] {
  if (!existsSync(path)) {
    throw new NotFoundError(`Orders file not found: ${path}`, path, {
      comment: 'Failed to locate the orders file',
    });
  }

  const text = readFileSync(path, 'utf-8');
  let content: unknown;
  try {
    content = JSON.parse(text);
  } catch (error) {
    throw new FormatError(
      `Orders file is not valid JSON: ${path}`,
      { comment: 'Failed to deserialize orders', path },
      error
    );
  }

  const parsed = orderFileSchema.safeParse(content);
  if (!parsed.success) {
    throw new FormatError(
      `Orders file does not match the order schema: ${path}`,
      {
        comment: 'Failed to deserialize orders',
        path,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      },
      parsed.error
    );
  }

  return parsed.data.map((record) => ({
    orderId: record.orderId ?? null,
    weight: record.weight ?? null,
    district: record.district ?? null,
    deliveryTime: record.deliveryTime,
  }));
}

/**
 * Overwrite `path` with the given orders as indented JSON.
 *
 * @throws WriteError when the file cannot be written
 */
export function saveOrders(orders: readonly Order[], path: string): void {
  const content = JSON.stringify(orders.map(toOrderRecord), null, 2) + '\n';
  try {
    writeFileSync(path, content, 'utf-8');
  } catch (error) {
    throw new WriteError(path, error, { comment: 'Failed to save orders' });
  }
}

/**
 * OrderRepositoryPort backed by JSON files on the local file system
 */
export class JsonOrderFileRepository implements OrderRepositoryPort {
  loadOrders(path: string): RawOrder[] {
    return loadOrders(path);
  }

  saveOrders(orders: readonly Order[], path: string): void {
    saveOrders(orders, path);
  }
}
