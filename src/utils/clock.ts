import { performance } from 'node:perf_hooks';

/**
 * Source of timestamps used for replenishment, in seconds.
 * Implementations must never go backwards under normal operation.
 */
export interface Clock {
  now(): number;
}

/**
 * Default clock backed by the monotonic high resolution timer, so that wall
 * clock adjustments never produce a negative elapsed time.
 */
export const monotonicClock: Clock = {
  now: () => performance.now() / 1000,
};
