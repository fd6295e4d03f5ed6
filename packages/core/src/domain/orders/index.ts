export type { Order, RawOrder } from './Order.js';
