/**
 * Component Wire Types
 *
 * Shapes returned by the inspector query surface for tracked components and
 * their metrics. Derived metrics are `null` when their denominator is zero.
 *
 * @module @shadowtree/shared/components
 */

// ============================================================================
// Vocabularies
// ============================================================================

/**
 * How much of a component's lifecycle the engine can observe.
 */
export const ComponentMode = {
  /** Lifecycle hooks call the engine directly; metrics are populated. */
  Enhanced: "enhanced",
  /** Only discoverable through host tree introspection. */
  Basic: "basic",
} as const;

export type ComponentMode = (typeof ComponentMode)[keyof typeof ComponentMode];

export const ComponentState = {
  Pending: "pending",
  Resolved: "resolved",
} as const;

export type ComponentState = (typeof ComponentState)[keyof typeof ComponentState];

/**
 * How a resolved record learned its id.
 */
export const MatchSource = {
  /** Attach hook reported the id */
  Direct: "direct",
  /** Snapshot entry held the same instance */
  Reference: "reference",
  /** Snapshot entry had no instance; matched on type name */
  TypeName: "type-name",
  /** Synthesized from a snapshot entry nobody registered */
  Snapshot: "snapshot",
} as const;

export type MatchSource = (typeof MatchSource)[keyof typeof MatchSource];

export interface ComponentTypeInfo {
  /** Short type name, e.g. "Counter" */
  name: string;
  /** Fully qualified type name, e.g. "App.Pages.Counter" */
  fullName: string;
}

// ============================================================================
// Metrics
// ============================================================================

export interface PhaseTimingDto {
  calls: number;
  lastMs: number | null;
  totalMs: number;
  averageMs: number | null;
}

export interface MetricsSnapshot {
  createdAt: number;
  disposedAt: number | null;

  initialize: PhaseTimingDto;
  initializeAsync: PhaseTimingDto;
  parametersSet: PhaseTimingDto;
  parametersSetAsync: PhaseTimingDto;
  setParameters: PhaseTimingDto;
  render: PhaseTimingDto;
  postRender: PhaseTimingDto;
  postRenderAsync: PhaseTimingDto;
  eventCallback: PhaseTimingDto;

  maxRenderMs: number | null;
  minRenderMs: number | null;
  lastRenderedAt: number | null;
  timeToFirstRenderMs: number | null;

  invalidations: {
    total: number;
    honored: number;
    suppressedAlreadyQueued: number;
    suppressedByPolicy: number;
  };
  renderGate: {
    allowed: number;
    declined: number;
    lastResult: boolean | null;
  };

  lifetimeMs: number | null;
  /** Renders per invalidation call, as a percentage */
  invalidationEfficiency: number | null;
  /** Suppressed invalidations over all invalidations, as a percentage */
  suppressionRatio: number | null;
  /** Declined render-gate decisions over all decisions, as a percentage */
  renderGateBlockRate: number | null;
  rendersPerMinute: number | null;
  totalLifecycleMs: number;
}

// ============================================================================
// Components
// ============================================================================

export interface ParameterInfo {
  name: string;
  typeName: string;
  /** Display form of the current value */
  value: string | null;
  /** Supplied by an ancestor rather than the direct parent */
  isCascading: boolean;
}

/** Lifecycle flags read from the live instance. */
export interface InternalState {
  hasNeverRendered: boolean;
  hasPendingQueuedRender: boolean;
  hasCalledPostRender: boolean;
  isInitialized: boolean;
}

/**
 * What a host-supplied reader reports about a live instance. Every part is
 * optional; an absent part is `null` in the summary.
 */
export interface ComponentDetails {
  parameters?: ParameterInfo[];
  /** Display name to display value */
  trackedState?: Record<string, string | null>;
  internalState?: InternalState;
}

export interface ComponentSummary {
  /** Host-assigned id; null while pending */
  componentId: number | null;
  state: ComponentState;
  mode: ComponentMode;
  typeName: string;
  typeFullName: string;
  parentId: number | null;
  matchedBy: MatchSource | null;
  createdAt: number;
  /** Renders observed through introspection (Basic mode) */
  basicRenderCount: number;
  lastRenderedAt: number | null;
  /** Present for Enhanced components only */
  metrics: MetricsSnapshot | null;
  /** From the details reader; null without one or once the instance is gone */
  parameters: ParameterInfo[] | null;
  trackedState: Record<string, string | null> | null;
  internalState: InternalState | null;
}

export interface ComponentCounts {
  resolved: number;
  pending: number;
  total: number;
  enhanced: number;
  basic: number;
}

export interface ComponentTreeNode {
  component: ComponentSummary;
  children: ComponentTreeNode[];
}
