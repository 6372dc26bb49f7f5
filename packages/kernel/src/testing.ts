/**
 * Kernel Testing Utilities
 *
 * Provides `createManualClock`, a {@link Clock} that only moves when told to,
 * for deterministic durations and throttling in tests.
 *
 * @example
 * ```typescript
 * import { createManualClock } from "@shadowtree/kernel/testing";
 *
 * const clock = createManualClock({ start: 1000 });
 * clock.advance(250);
 * clock.now(); // 1250
 * ```
 *
 * @module @shadowtree/kernel/testing
 */

import type { Clock } from "./clock.js";

export interface ManualClockOptions {
  /** Initial monotonic reading (default: 0) */
  start?: number;
  /** Epoch milliseconds matching the initial reading (default: 1_700_000_000_000) */
  epoch?: number;
}

export interface ManualClock extends Clock {
  /** Move both readings forward */
  advance(ms: number): void;
  /** Jump the monotonic reading to an absolute value */
  set(ms: number): void;
}

export function createManualClock(options: ManualClockOptions = {}): ManualClock {
  const start = options.start ?? 0;
  const epoch = options.epoch ?? 1_700_000_000_000;
  let current = start;

  return {
    now: () => current,
    wallTime: () => epoch + (current - start),
    advance(ms: number) {
      current += ms;
    },
    set(ms: number) {
      current = ms;
    },
  };
}
