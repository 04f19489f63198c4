/**
 * Clock port for time-dependent operations.
 * Retry scheduling, lease windows and idempotency expiry all read time
 * through it, so tests can pin "now" without Date hacks.
 */
export interface Clock {
  now(): Date;
}

export const CLOCK = Symbol('CLOCK');

export function addMilliseconds(date: Date, ms: number): Date {
  return new Date(date.getTime() + ms);
}
