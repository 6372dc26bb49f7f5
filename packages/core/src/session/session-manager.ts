/**
 * Session Manager
 *
 * One {@link ComponentRegistry} per session; the {@link TimelineRecorder} is
 * shared. Opening and closing sessions is recorded on the timeline.
 *
 * @module @shadowtree/core/session
 */

import { Logger, systemClock, type Clock } from "@shadowtree/kernel";
import { SessionNotFoundError, TimelineEventKind, type ComponentDetails } from "@shadowtree/shared";
import {
  createUnsupportedIntrospector,
  type HostTreeIntrospector,
} from "../host/introspector.js";
import { ComponentRegistry } from "../registry/registry.js";
import type { TimelineRecorder } from "../timeline/timeline-recorder.js";
import { SESSION_COMPONENT_ID } from "../timeline/types.js";

const log = Logger.for("SessionManager");

const SESSION_COMPONENT_NAME = "[Session]";

export interface SessionManagerOptions {
  recorder: TimelineRecorder;
  clock?: Clock;
  /** Default: 250 */
  minReconcileIntervalMs?: number;
  /** Details reader handed to every registry */
  describeInstance?: (instance: object) => ComponentDetails;
  /** Called after a session's registry is disposed and dropped */
  onSessionClosed?: (sessionId: string) => void;
}

export class SessionManager {
  private readonly sessions = new Map<string, ComponentRegistry>();
  private readonly recorder: TimelineRecorder;
  private readonly clock: Clock;
  private readonly minReconcileIntervalMs: number;
  private readonly describeInstance: ((instance: object) => ComponentDetails) | undefined;
  private readonly onSessionClosed: ((sessionId: string) => void) | undefined;

  constructor(options: SessionManagerOptions) {
    this.recorder = options.recorder;
    this.clock = options.clock ?? systemClock;
    this.minReconcileIntervalMs = options.minReconcileIntervalMs ?? 250;
    this.describeInstance = options.describeInstance;
    this.onSessionClosed = options.onSessionClosed;
  }

  /**
   * Registry for `sessionId`, created on first open. Reopening returns the
   * existing registry.
   */
  open(sessionId: string, introspector?: HostTreeIntrospector): ComponentRegistry {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;

    const registry = new ComponentRegistry({
      sessionId,
      introspector: introspector ?? createUnsupportedIntrospector(),
      clock: this.clock,
      minReconcileIntervalMs: this.minReconcileIntervalMs,
      describeInstance: this.describeInstance,
    });
    this.sessions.set(sessionId, registry);
    this.recorder.recordEvent({
      componentId: SESSION_COMPONENT_ID,
      componentName: SESSION_COMPONENT_NAME,
      kind: TimelineEventKind.SessionOpened,
      sessionId,
    });
    log.debug({ sessionId }, "Session opened");
    return registry;
  }

  close(sessionId: string): boolean {
    const registry = this.sessions.get(sessionId);
    if (!registry) return false;

    registry.dispose();
    this.sessions.delete(sessionId);
    this.recorder.recordEvent({
      componentId: SESSION_COMPONENT_ID,
      componentName: SESSION_COMPONENT_NAME,
      kind: TimelineEventKind.SessionClosed,
      sessionId,
    });
    this.onSessionClosed?.(sessionId);
    log.debug({ sessionId }, "Session closed");
    return true;
  }

  get(sessionId: string): ComponentRegistry | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * @throws SessionNotFoundError
   */
  require(sessionId: string): ComponentRegistry {
    const registry = this.sessions.get(sessionId);
    if (!registry) {
      throw new SessionNotFoundError(sessionId);
    }
    return registry;
  }

  sessionIds(): string[] {
    return [...this.sessions.keys()];
  }

  closeAll(): void {
    for (const sessionId of this.sessionIds()) {
      this.close(sessionId);
    }
  }
}
