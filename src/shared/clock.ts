/**
 * Injectable time source. Every time-dependent rule (lockout expiry, token
 * expiry, `$timeRange` conditions, cache TTLs) reads the time from here.
 */
export interface ClockSource {
  now(): Date;
}

export const systemClock: ClockSource = {
  now: () => new Date(),
};
