import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { DateTime } from 'luxon';
import type { Order } from '@delivery-filter/core';
import { FormatError, NotFoundError, WriteError } from '@delivery-filter/utils';
import {
  JsonOrderFileRepository,
  loadOrders,
  saveOrders,
} from '../../src/repositories/json-order-file-repository.js';

const at = (iso: string) => DateTime.fromISO(iso, { zone: 'utc' });

describe('JsonOrderFileRepository', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'delivery-orders-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('loadOrders', () => {
    it('throws NotFoundError when the file does not exist', () => {
      expect(() => loadOrders(join(dir, 'non_existing_file.json'))).toThrow(NotFoundError);
    });

    it('returns the stored orders', () => {
      const path = join(dir, 'test_orders.json');
      writeFileSync(
        path,
        JSON.stringify([
          {
            orderId: 'Order_1',
            weight: 5.0,
            district: 'District_1',
            deliveryTime: '2024-10-30T09:00:00',
          },
        ])
      );

      const result = loadOrders(path);

      expect(result).toHaveLength(1);
      expect(result[0].orderId).toBe('Order_1');
      expect(result[0].weight).toBe(5);
      expect(result[0].district).toBe('District_1');
      expect(result[0].deliveryTime?.toISO()).toBe('2024-10-30T09:00:00.000Z');
    });

    it('returns records unvalidated, with missing fields as null', () => {
      const path = join(dir, 'orders.json');
      writeFileSync(
        path,
        JSON.stringify([
          { orderId: '', weight: -1, district: '', deliveryTime: '0001-01-01T00:00:00' },
          { orderId: 'Order_2', extra: true },
        ])
      );

      const [first, second] = loadOrders(path);

      expect(first.orderId).toBe('');
      expect(first.weight).toBe(-1);
      expect(first.deliveryTime?.year).toBe(1);
      expect(second).toEqual({ orderId: 'Order_2', weight: null, district: null, deliveryTime: null });
    });

    it('accepts the settings timestamp layout', () => {
      const path = join(dir, 'orders.json');
      writeFileSync(path, JSON.stringify([{ orderId: 'A', deliveryTime: '2024-10-30 09:15:00' }]));

      expect(loadOrders(path)[0].deliveryTime?.toISO()).toBe('2024-10-30T09:15:00.000Z');
    });

    it('throws FormatError on malformed JSON', () => {
      const path = join(dir, 'orders.json');
      writeFileSync(path, '[{ "orderId": "Order_1", ');

      expect(() => loadOrders(path)).toThrow(FormatError);
      expect(() => loadOrders(path)).toThrow(`Orders file is not valid JSON: ${path}`);
    });

    it('throws FormatError when the content is not an array of orders', () => {
      const path = join(dir, 'orders.json');
      writeFileSync(path, JSON.stringify({ orderId: 'Order_1' }));

      expect(() => loadOrders(path)).toThrow(
        `Orders file does not match the order schema: ${path}`
      );
    });

    it('throws FormatError on a field of the wrong type', () => {
      const path = join(dir, 'orders.json');
      writeFileSync(path, JSON.stringify([{ orderId: 'Order_1', weight: '5' }]));

      expect(() => loadOrders(path)).toThrow(FormatError);
    });

    it('throws FormatError on a weight that overflows to Infinity', () => {
      const path = join(dir, 'orders.json');
      writeFileSync(
        path,
        '[{"orderId":"A","weight":1e400,"district":"District_1","deliveryTime":"2024-10-30T09:00:00"}]'
      );

      try {
        loadOrders(path);
        expect.unreachable('loadOrders should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(FormatError);
        expect(error).toMatchObject({
          context: { issues: ['0.weight: Number must be finite'] },
        });
      }
    });

    it('lets read failures through instead of reporting a format error', () => {
      let caught: unknown;
      try {
        loadOrders(dir);
      } catch (error) {
        caught = error;
      }

      expect(caught).not.toBeInstanceOf(FormatError);
      expect(caught).toMatchObject({ code: 'EISDIR' });
    });

    it('throws FormatError on an unparseable delivery time', () => {
      const path = join(dir, 'orders.json');
      writeFileSync(path, JSON.stringify([{ orderId: 'Order_1', deliveryTime: 'soon' }]));

      try {
        loadOrders(path);
        expect.unreachable('loadOrders should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(FormatError);
        expect(error).toMatchObject({
          code: 'FORMAT_ERROR',
          context: { issues: ['0.deliveryTime: Unparseable delivery time: soon'] },
        });
      }
    });
  });

  describe('saveOrders', () => {
    const orders: Order[] = [
      { orderId: 'Order_1', weight: 5, district: 'District_1', deliveryTime: at('2024-10-30T09:00:00') },
      { orderId: 'Order_2', weight: 2.5, district: 'District_1', deliveryTime: at('2024-10-30T09:15:00') },
    ];

    it('writes indented JSON with UTC timestamps', () => {
      const path = join(dir, 'filtered.json');

      saveOrders(orders, path);

      expect(readFileSync(path, 'utf-8')).toBe(
        [
          '[',
          '  {',
          '    "orderId": "Order_1",',
          '    "weight": 5,',
          '    "district": "District_1",',
          '    "deliveryTime": "2024-10-30T09:00:00Z"',
          '  },',
          '  {',
          '    "orderId": "Order_2",',
          '    "weight": 2.5,',
          '    "district": "District_1",',
          '    "deliveryTime": "2024-10-30T09:15:00Z"',
          '  }',
          ']',
          '',
        ].join('\n')
      );
    });

    it('overwrites existing content and writes [] for no orders', () => {
      const path = join(dir, 'filtered.json');
      writeFileSync(path, 'previous run');

      saveOrders([], path);

      expect(readFileSync(path, 'utf-8')).toBe('[]\n');
    });

    it('throws WriteError with the target path and cause', () => {
      const path = join(dir, 'missing-dir', 'filtered.json');

      try {
        saveOrders(orders, path);
        expect.unreachable('saveOrders should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(WriteError);
        expect(error).toMatchObject({ path, code: 'WRITE_ERROR' });
        expect(error).toHaveProperty('cause.code', 'ENOENT');
      }
      expect(existsSync(path)).toBe(false);
    });
  });

  it('round-trips saved orders through the port', () => {
    const repository = new JsonOrderFileRepository();
    const path = join(dir, 'orders.json');
    const order: Order = {
      orderId: 'Order_7',
      weight: 1.5,
      district: 'District_3',
      deliveryTime: at('2024-10-30T09:05:00'),
    };

    repository.saveOrders([order], path);
    const [loaded] = repository.loadOrders(path);

    expect(loaded.orderId).toBe('Order_7');
    expect(loaded.deliveryTime?.toMillis()).toBe(order.deliveryTime.toMillis());
  });
});
