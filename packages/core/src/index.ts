/**
 * # Shadowtree Core
 *
 * Shadow tracking of host-owned components:
 *
 * - **ComponentRegistry** - pending/resolved identity per session, reconciled
 *   against the host tree
 * - **LifecycleMetrics** - per-component timers, counters and derived ratios
 * - **TimelineRecorder** - bounded, causally linked event log with render
 *   batches and trigger correlation
 * - **ComponentInstrumentation** - never-throwing adapter for host hooks
 * - **LifecycleEventChannel** - buffered push of lifecycle events
 *
 * @module @shadowtree/core
 */

export * from "./identity/identity-table.js";
export * from "./metrics/lifecycle-metrics.js";
export * from "./host/introspector.js";
export * from "./host/reflective-introspector.js";
export * from "./registry/component-record.js";
export * from "./registry/registry.js";
export * from "./timeline/ring-buffer.js";
export * from "./timeline/types.js";
export * from "./timeline/timeline-recorder.js";
export * from "./push/event-channel.js";
export * from "./session/session-manager.js";
export * from "./instrumentation/instrumentation.js";
export * from "./engine.js";
