/**
 * Inspector API
 *
 * The query and control surface an external inspector talks to. Timeline
 * operations go to the shared recorder; component operations go to the
 * registry of the named session.
 *
 * @example
 * ```typescript
 * const inspector = new Inspector(engine);
 *
 * inspector.startRecording();
 * inspector.getComponent("circuit-1", 7); // null when unknown
 * inspector.getEventsSince(lastSeenId);
 * ```
 *
 * @module @shadowtree/devtools/inspector
 */

import type {
  ComponentRegistry,
  SessionManager,
  TimelineListener,
  TimelineRecorder,
} from "@shadowtree/core";
import type {
  ComponentCounts,
  ComponentRankingDto,
  ComponentSummary,
  ComponentTreeNode,
  RecordingStateDto,
  RenderBatchDto,
  TimelineEventDto,
} from "@shadowtree/shared";

export interface InspectorSource {
  readonly recorder: TimelineRecorder;
  readonly sessions: SessionManager;
}

export class Inspector {
  private readonly recorder: TimelineRecorder;
  private readonly sessions: SessionManager;

  constructor(source: InspectorSource) {
    this.recorder = source.recorder;
    this.sessions = source.sessions;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Recording control
  // ──────────────────────────────────────────────────────────────────────────

  startRecording(): RecordingStateDto {
    this.recorder.startRecording();
    return this.recorder.getState();
  }

  stopRecording(): RecordingStateDto {
    this.recorder.stopRecording();
    return this.recorder.getState();
  }

  clearEvents(): RecordingStateDto {
    this.recorder.clearEvents();
    return this.recorder.getState();
  }

  /** Returns the capacity applied after clamping. */
  setMaxEvents(maxEvents: number): number {
    return this.recorder.setMaxEvents(maxEvents);
  }

  getState(): RecordingStateDto {
    return this.recorder.getState();
  }

  subscribe(listener: TimelineListener): () => void {
    return this.recorder.subscribe(listener);
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Components
  // ──────────────────────────────────────────────────────────────────────────

  getSessionIds(): string[] {
    return this.sessions.sessionIds();
  }

  /** @throws SessionNotFoundError */
  getAllComponents(sessionId: string): ComponentSummary[] {
    return this.registry(sessionId).getAllComponents();
  }

  /** @throws SessionNotFoundError */
  getComponent(sessionId: string, componentId: number): ComponentSummary | null {
    return this.registry(sessionId).getComponent(componentId);
  }

  /** @throws SessionNotFoundError */
  getCounts(sessionId: string): ComponentCounts {
    return this.registry(sessionId).getCounts();
  }

  /** @throws SessionNotFoundError */
  getSubtree(sessionId: string, componentId: number): ComponentTreeNode | null {
    return this.registry(sessionId).getSubtree(componentId);
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Timeline
  // ──────────────────────────────────────────────────────────────────────────

  getEvents(): TimelineEventDto[] {
    return this.recorder.getEvents();
  }

  getEventsSince(eventId: number): TimelineEventDto[] {
    return this.recorder.getEventsSince(eventId);
  }

  getEventsInRange(startMs: number, endMs: number): TimelineEventDto[] {
    return this.recorder.getEventsInRange(startMs, endMs);
  }

  getEventsForComponent(componentId: number): TimelineEventDto[] {
    return this.recorder.getEventsForComponent(componentId);
  }

  getBatches(): RenderBatchDto[] {
    return this.recorder.getBatches();
  }

  getRankedComponents(): ComponentRankingDto[] {
    return this.recorder.getRankedComponents();
  }

  private registry(sessionId: string): ComponentRegistry {
    return this.sessions.require(sessionId);
  }
}
