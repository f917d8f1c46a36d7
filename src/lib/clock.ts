/** Injectable time source, in milliseconds. */
export interface Clock {
  now(): number;
}

/**
 * Monotonic clock anchored to the process start. Never jumps backwards when
 * the system clock is adjusted, so it is the default for quota windows.
 */
export const MONOTONIC_CLOCK: Clock = {
  now: () => performance.timeOrigin + performance.now(),
};

/** Wall clock (`Date.now()`), used for timestamps sent to remote services. */
export const WALL_CLOCK: Clock = { now: () => Date.now() };
