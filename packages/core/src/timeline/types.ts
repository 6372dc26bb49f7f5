import type { RenderTrigger, TimelineEventKind } from "@shadowtree/shared";

/**
 * Timeline event as stored by the recorder. Everything is fixed once
 * written except the duration pair, which an open event may have
 * back-filled once.
 */
export interface TimelineEvent {
  readonly eventId: number;
  readonly timestamp: number;
  readonly relativeMs: number;
  readonly componentId: number;
  readonly componentName: string;
  readonly kind: TimelineEventKind;
  durationMs: number | null;
  endRelativeMs: number | null;
  readonly parentEventId: number | null;
  readonly triggeringEventId: number | null;
  readonly trigger: RenderTrigger;
  readonly triggerDetails: string | null;
  readonly isAsync: boolean;
  readonly isFirstRender: boolean;
  readonly wasSuppressed: boolean;
  readonly isEnhanced: boolean;
  readonly batchId: number | null;
  readonly sessionId: string | null;
  readonly metadata: Readonly<Record<string, string>> | null;
}

export interface RenderBatch {
  readonly batchId: number;
  readonly startRelativeMs: number;
  endRelativeMs: number | null;
  componentIds: number[];
  readonly triggerSource: string | null;
  /** The batch-started event, parent of events recorded inside the batch */
  readonly startEventId: number;
  /** Components that rendered while the batch was open */
  readonly members: Set<number>;
}

export interface RecordEventInput {
  /** -1 for session-level events */
  componentId: number;
  componentName: string;
  kind: TimelineEventKind;
  durationMs?: number | null;
  isAsync?: boolean;
  isFirstRender?: boolean;
  wasSuppressed?: boolean;
  isEnhanced?: boolean;
  sessionId?: string | null;
  /** Overrides the details the correlation heuristic would write */
  triggerDetails?: string;
  /**
   * Identity for trigger correlation. Defaults to the component id; pass a
   * per-instance key for components still waiting for one.
   */
  correlationKey?: string;
  metadata?: Record<string, string>;
}

/** Returned by recording calls made while stopped. */
export const NOT_RECORDING = -1;

export const SESSION_COMPONENT_ID = -1;
