/**
 * Time sources. Durations are measured on the monotonic clock so that
 * wall-clock adjustments do not change them.
 */

import { performance } from 'perf_hooks';

export interface Clock {
  /** Wall-clock time */
  now(): Date;
  /** Monotonic milliseconds, only meaningful as a difference */
  monotonic(): number;
}

export const systemClock: Clock = {
  now: () => new Date(),
  monotonic: () => performance.now()
};

export function secondsBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / 1000;
}
