/**
 * Time sources. `now()` is monotonic milliseconds for durations and
 * relative offsets; `wallTime()` is epoch milliseconds for display.
 */
export interface Clock {
  now(): number;
  wallTime(): number;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  wallTime: () => Date.now(),
};
