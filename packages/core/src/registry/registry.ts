/**
 * Component Registry
 *
 * Per-session shadow of the host's component tree. Components enter as
 * Pending (instance known, id unknown) from the creation hook and become
 * Resolved either directly, when the attach hook reports the id, or through
 * {@link ComponentRegistry.reconcile}, which merges pending records with a
 * snapshot of the host tree.
 *
 * ## Reconciliation pass
 *
 * 1. Read one snapshot from the introspector.
 * 2. Promote every pending record whose instance appears in the snapshot.
 *    Basic-mode pending records may also match a snapshot entry that has no
 *    instance, on type name, first match wins.
 * 3. Refresh the parent of every resolved record still in the snapshot.
 * 4. Synthesize records for snapshot ids nobody registered. Instances that
 *    were unregistered are not brought back, even while the host still
 *    lists them.
 * 5. Drop resolved records whose id left the snapshot.
 *
 * After a completed pass the resolved ids are exactly the snapshot ids.
 *
 * @example
 * ```typescript
 * const registry = new ComponentRegistry({
 *   sessionId: "circuit-1",
 *   introspector: createReflectiveIntrospector(renderer),
 * });
 *
 * registry.registerPending(component, { name: "Counter", fullName: "App.Counter" }, "enhanced");
 * registry.getCounts(); // { resolved: 0, pending: 1, ... } until the host attaches it
 * ```
 *
 * @module @shadowtree/core/registry
 */

import { CriticalSection, Logger, bestEffort, systemClock, type Clock } from "@shadowtree/kernel";
import {
  ComponentMode,
  MatchSource,
  type ComponentCounts,
  type ComponentDetails,
  type ComponentSummary,
  type ComponentTreeNode,
  type ComponentTypeInfo,
} from "@shadowtree/shared";
import { IdentityTable } from "../identity/identity-table.js";
import { LifecycleMetrics } from "../metrics/lifecycle-metrics.js";
import {
  createUnsupportedIntrospector,
  safeIntrospect,
  type HostTreeEntry,
  type HostTreeIntrospector,
  type HostTreeSnapshot,
} from "../host/introspector.js";
import { ComponentRecord } from "./component-record.js";

const log = Logger.for("ComponentRegistry");

// ============================================================================
// Types
// ============================================================================

export interface ComponentRegistryOptions {
  /** Session this registry belongs to (default: "default") */
  sessionId?: string;
  /** Host tree source (default: unsupported, direct resolution only) */
  introspector?: HostTreeIntrospector;
  clock?: Clock;
  /** Minimum time between two reconciliation passes (default: 250) */
  minReconcileIntervalMs?: number;
  /**
   * Reads parameters, tracked state and lifecycle flags off a live
   * instance for summaries. A throwing reader yields no details.
   */
  describeInstance?: (instance: object) => ComponentDetails;
}

export interface ReconcileOptions {
  /** Ignore the throttle */
  force?: boolean;
}

export interface ReconcileStats {
  promoted: number;
  promotedByTypeName: number;
  reparented: number;
  synthesized: number;
  removed: number;
}

export type ReconcileResult =
  | ({ status: "completed" } & ReconcileStats)
  | { status: "throttled" }
  | { status: "busy" }
  | { status: "unsupported"; reason: string };

function isInstance(value: unknown): value is object {
  return (typeof value === "object" || typeof value === "function") && value !== null;
}

// ============================================================================
// Registry
// ============================================================================

export class ComponentRegistry {
  readonly sessionId: string;

  private readonly pending = new IdentityTable<ComponentRecord>();
  private readonly resolved = new Map<number, ComponentRecord>();
  private resolvedByInstance = new WeakMap<object, ComponentRecord>();
  private readonly unregistered = new WeakSet<object>();

  private readonly section = new CriticalSection();
  private readonly introspector: HostTreeIntrospector;
  private readonly clock: Clock;
  private readonly minReconcileIntervalMs: number;
  private readonly describeInstance: ((instance: object) => ComponentDetails) | null;
  private lastReconcileAt: number | null = null;
  private disposed = false;

  constructor(options: ComponentRegistryOptions = {}) {
    this.sessionId = options.sessionId ?? "default";
    this.introspector = options.introspector ?? createUnsupportedIntrospector();
    this.clock = options.clock ?? systemClock;
    this.minReconcileIntervalMs = options.minReconcileIntervalMs ?? 250;
    this.describeInstance = options.describeInstance ?? null;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Lifecycle input
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Track a freshly created instance as Pending. Registering the same
   * instance again replaces its record.
   */
  registerPending(instance: unknown, typeInfo: ComponentTypeInfo, mode: ComponentMode): void {
    if (!isInstance(instance) || this.disposed) return;

    this.section.run(() => {
      this.unregistered.delete(instance);
      this.forgetResolvedInstance(instance);
      const record = new ComponentRecord({
        instance,
        typeInfo,
        mode,
        createdAt: this.clock.wallTime(),
        metrics: mode === ComponentMode.Enhanced ? new LifecycleMetrics(this.clock) : null,
      });
      this.pending.set(instance, record);
    });
  }

  /**
   * Promote a pending instance to Resolved with the id the host assigned.
   * Returns false, changing nothing, when the instance is not pending.
   */
  resolveDirect(instance: unknown, componentId: number): boolean {
    if (!isInstance(instance)) return false;

    return this.section.run(() => {
      const record = this.pending.get(instance);
      if (!record) return false;
      this.promote(instance, record, componentId, record.parentId, MatchSource.Direct);
      log.trace({ sessionId: this.sessionId, componentId }, "Resolved directly");
      return true;
    });
  }

  /**
   * Forget an instance, pending or resolved. Its metrics are stamped
   * disposed first. Later passes will not synthesize it again.
   */
  unregister(instance: unknown): boolean {
    if (!isInstance(instance)) return false;

    return this.section.run(() => {
      this.unregistered.add(instance);
      const pending = this.pending.get(instance);
      if (pending) {
        pending.metrics?.markDisposed();
        this.pending.delete(instance);
        return true;
      }
      const record = this.resolvedByInstance.get(instance);
      if (!record) return false;
      record.metrics?.markDisposed();
      this.resolvedByInstance.delete(instance);
      if (record.componentId !== null && this.resolved.get(record.componentId) === record) {
        this.resolved.delete(record.componentId);
      }
      return true;
    });
  }

  /** Forget a resolved component the host reported disposed. */
  unregisterById(componentId: number): boolean {
    return this.section.run(() => {
      const record = this.resolved.get(componentId);
      if (!record) return false;
      this.removeResolved(componentId, record);
      record.metrics?.markDisposed();
      return true;
    });
  }

  /** Count a render observed for a Basic-mode component. */
  recordBasicRender(componentId: number): boolean {
    return this.section.run(() => {
      const record = this.resolved.get(componentId);
      if (!record) return false;
      record.noteBasicRender(this.clock.wallTime());
      return true;
    });
  }

  /**
   * Record for an instance, pending or resolved, without reconciling.
   * Used on hook paths.
   */
  recordFor(instance: unknown): ComponentRecord | undefined {
    if (!isInstance(instance) || this.disposed) return undefined;
    return this.pending.get(instance) ?? this.resolvedByInstance.get(instance);
  }

  /** Resolved record by id, without reconciling. */
  recordById(componentId: number): ComponentRecord | undefined {
    return this.resolved.get(componentId);
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Reconciliation
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Merge pending records with the host tree. Throttled unless forced;
   * skipped when a pass is already running. Never throws.
   */
  reconcile(options: ReconcileOptions = {}): ReconcileResult {
    if (this.disposed) return { status: "throttled" };

    const now = this.clock.now();
    if (
      !options.force &&
      this.lastReconcileAt !== null &&
      now - this.lastReconcileAt < this.minReconcileIntervalMs
    ) {
      return { status: "throttled" };
    }

    const attempt = this.section.tryRun(() => this.reconcilePass());
    if (!attempt.entered) {
      log.debug({ sessionId: this.sessionId }, "Reconcile skipped, pass already running");
      return { status: "busy" };
    }
    return attempt.value;
  }

  private reconcilePass(): ReconcileResult {
    this.lastReconcileAt = this.clock.now();

    const result = safeIntrospect(this.introspector, log);
    if (!result.supported) {
      return { status: "unsupported", reason: result.reason };
    }

    try {
      const stats = this.merge(result.snapshot);
      if (stats.promoted + stats.synthesized + stats.removed + stats.reparented > 0) {
        log.debug({ sessionId: this.sessionId, ...stats }, "Reconciled with host tree");
      }
      return { status: "completed", ...stats };
    } catch (error) {
      log.warn({ err: error, sessionId: this.sessionId }, "Reconcile pass failed");
      return { status: "unsupported", reason: error instanceof Error ? error.message : String(error) };
    }
  }

  private merge(snapshot: HostTreeSnapshot): ReconcileStats {
    const stats: ReconcileStats = {
      promoted: 0,
      promotedByTypeName: 0,
      reparented: 0,
      synthesized: 0,
      removed: 0,
    };

    const idByInstance = new Map<object, number>();
    for (const entry of snapshot.values()) {
      if (entry.instance) idByInstance.set(entry.instance, entry.componentId);
    }

    // Promote pending by reference identity
    for (const [instance, record] of this.pending.entries()) {
      const componentId = idByInstance.get(instance);
      if (componentId === undefined) continue;
      const entry = snapshot.get(componentId);
      this.promote(instance, record, componentId, entry?.parentId ?? null, MatchSource.Reference);
      stats.promoted++;
    }

    // Lower-confidence fallback: entries the host exposes without an instance
    for (const entry of snapshot.values()) {
      if (entry.instance !== null || this.resolved.has(entry.componentId)) continue;
      const match = this.findPendingByTypeName(entry);
      if (!match) continue;
      this.promote(match[0], match[1], entry.componentId, entry.parentId, MatchSource.TypeName);
      stats.promoted++;
      stats.promotedByTypeName++;
    }

    // Refresh parents
    for (const [componentId, record] of this.resolved) {
      const entry = snapshot.get(componentId);
      if (entry && record.parentId !== entry.parentId) {
        record.parentId = entry.parentId;
        stats.reparented++;
      }
    }

    // Synthesize records the creation hook never saw
    for (const entry of snapshot.values()) {
      if (this.resolved.has(entry.componentId)) continue;
      if (entry.instance && this.pending.has(entry.instance)) continue;
      if (entry.instance && this.unregistered.has(entry.instance)) continue;
      const record = new ComponentRecord({
        instance: entry.instance,
        typeInfo: entry.typeInfo,
        mode: ComponentMode.Basic,
        createdAt: this.clock.wallTime(),
        metrics: null,
      });
      record.resolve(entry.componentId, entry.parentId, MatchSource.Snapshot);
      this.resolved.set(entry.componentId, record);
      if (entry.instance) this.resolvedByInstance.set(entry.instance, record);
      stats.synthesized++;
    }

    // Drop what the host no longer reports
    for (const [componentId, record] of this.resolved) {
      if (snapshot.has(componentId)) continue;
      this.removeResolved(componentId, record);
      stats.removed++;
    }

    return stats;
  }

  private findPendingByTypeName(entry: HostTreeEntry): [object, ComponentRecord] | undefined {
    for (const [instance, record] of this.pending.entries()) {
      if (!record.isEnhanced && record.typeInfo.name === entry.typeInfo.name) {
        return [instance, record];
      }
    }
    return undefined;
  }

  private promote(
    instance: object,
    record: ComponentRecord,
    componentId: number,
    parentId: number | null,
    matchedBy: MatchSource,
  ): void {
    const existing = this.resolved.get(componentId);
    if (existing && existing !== record) {
      this.removeResolved(componentId, existing);
    }
    this.pending.delete(instance);
    record.resolve(componentId, parentId, matchedBy);
    this.resolved.set(componentId, record);
    this.resolvedByInstance.set(instance, record);
  }

  private removeResolved(componentId: number, record: ComponentRecord): void {
    this.resolved.delete(componentId);
    const instance = record.instance;
    if (instance && this.resolvedByInstance.get(instance) === record) {
      this.resolvedByInstance.delete(instance);
    }
  }

  private forgetResolvedInstance(instance: object): void {
    const record = this.resolvedByInstance.get(instance);
    if (record && record.componentId !== null) {
      this.removeResolved(record.componentId, record);
    }
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Queries
  // ──────────────────────────────────────────────────────────────────────────

  getComponent(componentId: number): ComponentSummary | null {
    this.reconcile();
    const record = this.resolved.get(componentId);
    return record ? this.summarize(record) : null;
  }

  /** Resolved components by ascending id, then pending ones. */
  getAllComponents(): ComponentSummary[] {
    this.reconcile();
    const resolved = [...this.resolved.values()]
      .sort((a, b) => (a.componentId ?? 0) - (b.componentId ?? 0))
      .map((record) => this.summarize(record));
    const pending = [...this.pending.values()].map((record) => this.summarize(record));
    return [...resolved, ...pending];
  }

  getCounts(): ComponentCounts {
    this.reconcile();
    let enhanced = 0;
    let basic = 0;
    let pending = 0;
    const count = (record: ComponentRecord) => {
      if (record.isEnhanced) enhanced++;
      else basic++;
    };
    for (const record of this.resolved.values()) count(record);
    for (const record of this.pending.values()) {
      count(record);
      pending++;
    }
    return {
      resolved: this.resolved.size,
      pending,
      total: this.resolved.size + pending,
      enhanced,
      basic,
    };
  }

  getChildren(componentId: number): ComponentSummary[] {
    this.reconcile();
    return [...this.resolved.values()]
      .filter((record) => record.parentId === componentId)
      .sort((a, b) => (a.componentId ?? 0) - (b.componentId ?? 0))
      .map((record) => this.summarize(record));
  }

  /**
   * The component and its resolved descendants, or null when the root is
   * not resolved.
   */
  getSubtree(rootId: number): ComponentTreeNode | null {
    this.reconcile();
    const root = this.resolved.get(rootId);
    if (!root) return null;

    const childrenOf = new Map<number, ComponentRecord[]>();
    for (const record of this.resolved.values()) {
      if (record.parentId === null) continue;
      const siblings = childrenOf.get(record.parentId) ?? [];
      siblings.push(record);
      childrenOf.set(record.parentId, siblings);
    }

    const visited = new Set<number>();
    const build = (record: ComponentRecord, componentId: number): ComponentTreeNode => {
      visited.add(componentId);
      const children = (childrenOf.get(componentId) ?? [])
        .filter((child) => child.componentId !== null && !visited.has(child.componentId))
        .sort((a, b) => (a.componentId ?? 0) - (b.componentId ?? 0))
        .map((child) => build(child, child.componentId ?? -1));
      return { component: this.summarize(record), children };
    };
    return build(root, rootId);
  }

  /** Host id of an instance, or null while pending or unknown. */
  idOf(instance: unknown): number | null {
    this.reconcile();
    if (!isInstance(instance) || this.disposed) return null;
    return this.resolvedByInstance.get(instance)?.componentId ?? null;
  }

  /** Drop every record. Later input is ignored. */
  dispose(): void {
    this.section.run(() => {
      this.disposed = true;
      this.pending.clear();
      this.resolved.clear();
      this.resolvedByInstance = new WeakMap();
    });
  }

  private summarize(record: ComponentRecord): ComponentSummary {
    const instance = record.instance;
    const reader = this.describeInstance;
    if (!instance || !reader) return record.toSummary();
    const details = bestEffort<ComponentDetails>(log, "describeInstance", {}, () => reader(instance));
    return record.toSummary(details);
  }
}
