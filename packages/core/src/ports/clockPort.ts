import { DateTime } from 'luxon';

export interface ClockPort {
  now(): DateTime;
}

/**
 * Create a system clock adapter that uses the wall clock.
 *
 * Only composition roots (the CLI entry point) should create one.
 * Everything else takes a ClockPort so tests can pin the time.
 */
export function createSystemClock(): ClockPort {
  return { now: () => DateTime.now() };
}
