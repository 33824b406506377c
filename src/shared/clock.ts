/**
 * Injectable time source. Every window, cooldown and backoff computation
 * reads time through a Clock so tests can drive it deterministically.
 */

export interface Clock {
  /** Current time as a Unix timestamp in milliseconds. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
