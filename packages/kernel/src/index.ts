/**
 * # Shadowtree Kernel
 *
 * Ambient infrastructure for the engine packages:
 *
 * - **Logger** - pino-backed module loggers with a swappable root
 * - **Config** - zod-validated configuration with environment overrides
 * - **Clock** - monotonic and wall time sources
 * - **CriticalSection** - re-entry guard for synchronous state mutation
 * - **bestEffort** - never-throw wrapper for host-facing calls
 *
 * Test helpers live in `@shadowtree/kernel/testing`.
 *
 * @module @shadowtree/kernel
 */

export * from "./logger.js";
export * from "./config.js";
export * from "./clock.js";
export * from "./critical-section.js";
export * from "./best-effort.js";
