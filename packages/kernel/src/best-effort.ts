import type { ModuleLogger } from "./logger.js";

/**
 * Run `fn`, returning `fallback` if it throws.
 *
 * Used at every point where engine code is called from a host lifecycle
 * hook: a failure here lowers data quality and must never reach the host's
 * call stack.
 *
 * @example
 * ```typescript
 * const id = bestEffort(log, "resolve", null, () => registry.idOf(instance));
 * ```
 */
export function bestEffort<T>(log: ModuleLogger, operation: string, fallback: T, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    log.debug({ err: error, operation }, "best-effort operation failed");
    return fallback;
  }
}
