/**
 * Timeline Vocabulary and Wire Types
 *
 * Event kinds and render-trigger categories are closed numeric enums inside
 * the engine. Their string names exist only at the query boundary, where
 * {@link serializeEventKind} and {@link serializeRenderTrigger} convert them.
 *
 * @module @shadowtree/shared/timeline
 */

// ============================================================================
// Event Kinds
// ============================================================================

/**
 * Fixed vocabulary of timeline event kinds.
 */
export const TimelineEventKind = {
  Initialize: 0,
  ParametersSet: 1,
  Render: 2,
  PostRender: 3,
  Dispose: 4,
  Invalidation: 5,
  InvalidationSuppressed: 6,
  CallbackInvoked: 7,
  BatchStarted: 8,
  BatchCompleted: 9,
  BasicRender: 10,
  SessionOpened: 11,
  SessionClosed: 12,
  Navigation: 13,
} as const;

export type TimelineEventKind = (typeof TimelineEventKind)[keyof typeof TimelineEventKind];

const EVENT_KIND_NAMES = {
  [TimelineEventKind.Initialize]: "initialize",
  [TimelineEventKind.ParametersSet]: "parameters-set",
  [TimelineEventKind.Render]: "render",
  [TimelineEventKind.PostRender]: "post-render",
  [TimelineEventKind.Dispose]: "dispose",
  [TimelineEventKind.Invalidation]: "invalidation",
  [TimelineEventKind.InvalidationSuppressed]: "invalidation-suppressed",
  [TimelineEventKind.CallbackInvoked]: "callback-invoked",
  [TimelineEventKind.BatchStarted]: "batch-started",
  [TimelineEventKind.BatchCompleted]: "batch-completed",
  [TimelineEventKind.BasicRender]: "basic-render",
  [TimelineEventKind.SessionOpened]: "session-opened",
  [TimelineEventKind.SessionClosed]: "session-closed",
  [TimelineEventKind.Navigation]: "navigation",
} as const satisfies Record<TimelineEventKind, string>;

export type TimelineEventKindName = (typeof EVENT_KIND_NAMES)[TimelineEventKind];

const ALL_EVENT_KINDS: readonly TimelineEventKind[] = Object.values(TimelineEventKind);

const EVENT_KINDS_BY_NAME = new Map<string, TimelineEventKind>(
  ALL_EVENT_KINDS.map((kind) => [EVENT_KIND_NAMES[kind], kind]),
);

export function serializeEventKind(kind: TimelineEventKind): TimelineEventKindName {
  return EVENT_KIND_NAMES[kind];
}

/**
 * Parse a wire name back into an event kind.
 * Returns undefined for names outside the vocabulary.
 */
export function parseEventKind(name: string): TimelineEventKind | undefined {
  return EVENT_KINDS_BY_NAME.get(name);
}

// ============================================================================
// Render Triggers
// ============================================================================

/**
 * Probable cause attributed to a render.
 */
export const RenderTrigger = {
  Unknown: 0,
  FirstRender: 1,
  ParameterChanged: 2,
  Invalidation: 3,
  CallbackInvoked: 4,
  ParentRerendered: 5,
} as const;

export type RenderTrigger = (typeof RenderTrigger)[keyof typeof RenderTrigger];

const RENDER_TRIGGER_NAMES = {
  [RenderTrigger.Unknown]: "unknown",
  [RenderTrigger.FirstRender]: "first-render",
  [RenderTrigger.ParameterChanged]: "parameter-changed",
  [RenderTrigger.Invalidation]: "invalidation",
  [RenderTrigger.CallbackInvoked]: "callback-invoked",
  [RenderTrigger.ParentRerendered]: "parent-rerendered",
} as const satisfies Record<RenderTrigger, string>;

export type RenderTriggerName = (typeof RENDER_TRIGGER_NAMES)[RenderTrigger];

export function serializeRenderTrigger(trigger: RenderTrigger): RenderTriggerName {
  return RENDER_TRIGGER_NAMES[trigger];
}

// ============================================================================
// Wire Types
// ============================================================================

/**
 * Timeline event as returned to the inspector.
 */
export interface TimelineEventDto {
  /** Monotonic, gapless sequence id within one recording */
  eventId: number;
  /** Wall-clock time in epoch milliseconds */
  timestamp: number;
  /** Milliseconds since recording started */
  relativeMs: number;
  /** -1 for session-level events */
  componentId: number;
  componentName: string;
  kind: TimelineEventKindName;
  durationMs: number | null;
  endRelativeMs: number | null;
  /** Enclosing render batch's batch-started event */
  parentEventId: number | null;
  triggeringEventId: number | null;
  trigger: RenderTriggerName;
  triggerDetails: string | null;
  isAsync: boolean;
  isFirstRender: boolean;
  wasSuppressed: boolean;
  isEnhanced: boolean;
  batchId: number | null;
  sessionId: string | null;
  metadata: Record<string, string> | null;
}

export interface RenderBatchDto {
  batchId: number;
  startRelativeMs: number;
  endRelativeMs: number | null;
  durationMs: number | null;
  componentIds: number[];
  componentCount: number;
  triggerSource: string | null;
}

export interface RecordingStateDto {
  isRecording: boolean;
  /** Epoch milliseconds, null while stopped */
  startedAt: number | null;
  elapsedMs: number;
  eventCount: number;
  batchCount: number;
  maxEvents: number;
}

/**
 * Render time aggregated per component, ordered by total time.
 */
export interface ComponentRankingDto {
  componentId: number;
  componentName: string;
  totalRenderMs: number;
  renderCount: number;
  averageRenderMs: number;
  maxRenderMs: number;
  minRenderMs: number;
}
