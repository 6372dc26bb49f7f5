import {
  ComponentMode,
  ComponentState,
  type ComponentDetails,
  type ComponentSummary,
  type ComponentTypeInfo,
  type MatchSource,
} from "@shadowtree/shared";
import type { LifecycleMetrics } from "../metrics/lifecycle-metrics.js";

export interface ComponentRecordInit {
  instance: object | null;
  typeInfo: ComponentTypeInfo;
  mode: ComponentMode;
  /** Epoch milliseconds */
  createdAt: number;
  /** Enhanced records only */
  metrics: LifecycleMetrics | null;
}

let lastRecordKey = 0;

/**
 * Tracking record for one component instance.
 *
 * Holds the instance through a `WeakRef` only; a record never keeps its
 * component alive.
 */
export class ComponentRecord {
  /** Stable for the record's life, pending or resolved */
  readonly key = `record:${++lastRecordKey}`;
  componentId: number | null = null;
  state: ComponentState = ComponentState.Pending;
  parentId: number | null = null;
  matchedBy: MatchSource | null = null;

  basicRenderCount = 0;
  private lastBasicRenderAt: number | null = null;

  readonly typeInfo: ComponentTypeInfo;
  readonly mode: ComponentMode;
  readonly createdAt: number;
  readonly metrics: LifecycleMetrics | null;
  private readonly instanceRef: WeakRef<object> | null;

  constructor(init: ComponentRecordInit) {
    this.instanceRef = init.instance ? new WeakRef(init.instance) : null;
    this.typeInfo = init.typeInfo;
    this.mode = init.mode;
    this.createdAt = init.createdAt;
    this.metrics = init.metrics;
  }

  /** The instance, if it is still alive and was ever known. */
  get instance(): object | undefined {
    return this.instanceRef?.deref();
  }

  get isEnhanced(): boolean {
    return this.mode === ComponentMode.Enhanced;
  }

  /**
   * Promote to Resolved. Creation time and accumulated metrics carry over.
   */
  resolve(componentId: number, parentId: number | null, matchedBy: MatchSource): void {
    this.componentId = componentId;
    this.parentId = parentId;
    this.matchedBy = matchedBy;
    this.state = ComponentState.Resolved;
  }

  noteBasicRender(at: number): void {
    this.basicRenderCount++;
    this.lastBasicRenderAt = at;
  }

  toSummary(details: ComponentDetails = {}): ComponentSummary {
    const metrics = this.metrics?.snapshot() ?? null;
    return {
      componentId: this.componentId,
      state: this.state,
      mode: this.mode,
      typeName: this.typeInfo.name,
      typeFullName: this.typeInfo.fullName,
      parentId: this.parentId,
      matchedBy: this.matchedBy,
      createdAt: this.createdAt,
      basicRenderCount: this.basicRenderCount,
      lastRenderedAt: metrics?.lastRenderedAt ?? this.lastBasicRenderAt,
      metrics,
      parameters: details.parameters ?? null,
      trackedState: details.trackedState ?? null,
      internalState: details.internalState ?? null,
    };
  }
}
