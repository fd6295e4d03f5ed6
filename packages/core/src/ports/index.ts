/**
 * Ports Barrel Export
 *
 * All port interfaces are exported from here.
 * Handlers depend on these interfaces.
 */

export { createSystemClock, type ClockPort } from './clockPort.js';
export type { LoggerPort } from './loggerPort.js';
export type { OrderRepositoryPort } from './orderRepositoryPort.js';
