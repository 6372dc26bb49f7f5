/**
 * # Shadowtree Shared Types
 *
 * Wire types and vocabularies shared by the engine and the inspector
 * surface:
 *
 * - **Timeline** - event kinds, render triggers, event and batch DTOs
 * - **Components** - component summaries, counts and metrics snapshots
 * - **Errors** - coded error classes and guards
 *
 * @module @shadowtree/shared
 */

export * from "./timeline.js";
export * from "./components.js";
export * from "./errors.js";
