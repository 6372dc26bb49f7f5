/**
 * Timeline Recorder
 *
 * Process-wide log of lifecycle events and render batches, shared by every
 * session. One instance is constructed at startup and injected wherever
 * events are recorded or queried.
 *
 * ## States
 *
 * `stopped -> recording -> stopped`. Starting clears events, batches, the
 * sequence counter and the correlation indices, and restarts the relative
 * clock. Stopping freezes the buffer. `clearEvents` works in either state.
 *
 * ## Trigger correlation
 *
 * A render for component C is attributed to the most recent, in priority
 * order: invalidation call, callback invocation, parameters-set on C. With
 * none of those, the parent re-rendered. First renders are always
 * `first-render`. Every render consumes C's indices, and so does C's
 * dispose event. Indices are keyed by `correlationKey` when the caller
 * gives one, so components that have no host id yet stay apart.
 *
 * Recording calls never throw; a failure is logged and the call returns
 * {@link NOT_RECORDING}.
 *
 * @example
 * ```typescript
 * const recorder = new TimelineRecorder({ maxEvents: 2000 });
 * recorder.startRecording();
 *
 * const batch = recorder.recordBatchStart("navigation");
 * recorder.recordEvent({ componentId: 4, componentName: "Counter", kind: TimelineEventKind.Render, durationMs: 1.5 });
 * recorder.recordBatchEnd(batch);
 *
 * recorder.getRankedComponents();
 * ```
 *
 * @module @shadowtree/core/timeline
 */

import { CriticalSection, Logger, bestEffort, systemClock, type Clock } from "@shadowtree/kernel";
import {
  RenderTrigger,
  TimelineEventKind,
  serializeEventKind,
  serializeRenderTrigger,
  type ComponentRankingDto,
  type RecordingStateDto,
  type RenderBatchDto,
  type TimelineEventDto,
} from "@shadowtree/shared";
import { RingBuffer } from "./ring-buffer.js";
import {
  NOT_RECORDING,
  SESSION_COMPONENT_ID,
  type RecordEventInput,
  type RenderBatch,
  type TimelineEvent,
} from "./types.js";

const log = Logger.for("TimelineRecorder");

export const DEFAULT_MAX_EVENTS = 5000;
export const DEFAULT_MAX_BATCHES = 500;
export const MIN_MAX_EVENTS = 100;
export const MAX_MAX_EVENTS = 50_000;

const BATCH_COMPONENT_NAME = "[RenderBatch]";

export interface TimelineRecorderOptions {
  clock?: Clock;
  /** Event capacity. Not clamped here; {@link TimelineRecorder.setMaxEvents} clamps. */
  maxEvents?: number;
  maxBatches?: number;
}

export type TimelineListener = (event: TimelineEventDto) => void;

export function toEventDto(event: TimelineEvent): TimelineEventDto {
  return {
    eventId: event.eventId,
    timestamp: event.timestamp,
    relativeMs: event.relativeMs,
    componentId: event.componentId,
    componentName: event.componentName,
    kind: serializeEventKind(event.kind),
    durationMs: event.durationMs,
    endRelativeMs: event.endRelativeMs,
    parentEventId: event.parentEventId,
    triggeringEventId: event.triggeringEventId,
    trigger: serializeRenderTrigger(event.trigger),
    triggerDetails: event.triggerDetails,
    isAsync: event.isAsync,
    isFirstRender: event.isFirstRender,
    wasSuppressed: event.wasSuppressed,
    isEnhanced: event.isEnhanced,
    batchId: event.batchId,
    sessionId: event.sessionId,
    metadata: event.metadata ? { ...event.metadata } : null,
  };
}

function toBatchDto(batch: RenderBatch): RenderBatchDto {
  return {
    batchId: batch.batchId,
    startRelativeMs: batch.startRelativeMs,
    endRelativeMs: batch.endRelativeMs,
    durationMs: batch.endRelativeMs === null ? null : batch.endRelativeMs - batch.startRelativeMs,
    componentIds: [...batch.componentIds],
    componentCount: batch.componentIds.length,
    triggerSource: batch.triggerSource,
  };
}

interface Correlation {
  trigger: RenderTrigger;
  triggeringEventId: number | null;
  details: string | null;
}

export class TimelineRecorder {
  private readonly clock: Clock;
  private readonly section = new CriticalSection();
  private readonly events: RingBuffer<TimelineEvent>;
  private readonly batches: RingBuffer<RenderBatch>;
  private readonly listeners = new Set<TimelineListener>();

  private recording = false;
  private originMs = 0;
  private startedAt: number | null = null;
  private lastEventId = 0;
  private lastBatchId = 0;
  private openBatch: RenderBatch | null = null;

  // Correlation indices: correlation key -> event id
  private readonly lastInvalidation = new Map<string, number>();
  private readonly lastCallback = new Map<string, number>();
  private readonly lastParametersSet = new Map<string, number>();

  constructor(options: TimelineRecorderOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.events = new RingBuffer(options.maxEvents ?? DEFAULT_MAX_EVENTS);
    this.batches = new RingBuffer(options.maxBatches ?? DEFAULT_MAX_BATCHES);
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Recording control
  // ──────────────────────────────────────────────────────────────────────────

  get isRecording(): boolean {
    return this.recording;
  }

  get maxEvents(): number {
    return this.events.capacity;
  }

  startRecording(): void {
    this.section.run(() => {
      this.reset();
      this.recording = true;
    });
    log.info({ maxEvents: this.maxEvents }, "Recording started");
  }

  stopRecording(): void {
    this.section.run(() => {
      this.recording = false;
      this.openBatch = null;
    });
    log.info({ eventCount: this.events.size }, "Recording stopped");
  }

  clearEvents(): void {
    this.section.run(() => {
      const wasRecording = this.recording;
      this.reset();
      if (!wasRecording) this.startedAt = null;
    });
  }

  /**
   * Set the event capacity, clamped to [100, 50000]. Overflow is evicted
   * immediately, oldest first. Returns the capacity applied.
   */
  setMaxEvents(maxEvents: number): number {
    if (Number.isNaN(maxEvents)) return this.maxEvents;
    const clamped = Math.min(Math.max(Math.trunc(maxEvents), MIN_MAX_EVENTS), MAX_MAX_EVENTS);
    this.section.run(() => this.events.resize(clamped));
    if (clamped !== maxEvents) {
      log.debug({ requested: maxEvents, applied: clamped }, "Event capacity clamped");
    }
    return clamped;
  }

  getState(): RecordingStateDto {
    return this.section.run(() => ({
      isRecording: this.recording,
      startedAt: this.recording ? this.startedAt : null,
      elapsedMs: this.recording ? this.relativeNow() : 0,
      eventCount: this.events.size,
      batchCount: this.batches.size,
      maxEvents: this.events.capacity,
    }));
  }

  /**
   * Receive every event as it is recorded. Returns an unsubscribe function.
   */
  subscribe(listener: TimelineListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Recording
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Append an event. Returns its sequence id, or {@link NOT_RECORDING} while
   * stopped.
   */
  recordEvent(input: RecordEventInput): number {
    return bestEffort(log, "recordEvent", NOT_RECORDING, () =>
      this.section.run(() => (this.recording ? this.append(input) : NOT_RECORDING)),
    );
  }

  /**
   * Append an event whose duration is not known yet. Complete it with
   * {@link recordEventEnd}.
   */
  recordEventStart(input: Omit<RecordEventInput, "durationMs">): number {
    return this.recordEvent({ ...input, durationMs: null });
  }

  /**
   * Back-fill the duration of an open event. Returns false when the event
   * was evicted, never existed, or already has a duration.
   */
  recordEventEnd(eventId: number, durationMs: number): boolean {
    return bestEffort(log, "recordEventEnd", false, () =>
      this.section.run(() => {
        const event = this.findEvent(eventId);
        if (!event || event.durationMs !== null) return false;
        event.durationMs = durationMs;
        event.endRelativeMs = event.relativeMs + durationMs;
        return true;
      }),
    );
  }

  /**
   * Open a render batch. Events recorded until {@link recordBatchEnd} take
   * the batch-started event as their parent.
   */
  recordBatchStart(triggerSource?: string): number {
    return bestEffort(log, "recordBatchStart", NOT_RECORDING, () =>
      this.section.run(() => {
        if (!this.recording) return NOT_RECORDING;

        const batchId = ++this.lastBatchId;
        const startEventId = this.append({
          componentId: SESSION_COMPONENT_ID,
          componentName: BATCH_COMPONENT_NAME,
          kind: TimelineEventKind.BatchStarted,
          metadata: triggerSource ? { triggerSource } : undefined,
        }, batchId, null);

        const batch: RenderBatch = {
          batchId,
          startRelativeMs: this.relativeNow(),
          endRelativeMs: null,
          componentIds: [],
          triggerSource: triggerSource ?? null,
          startEventId,
          members: new Set(),
        };
        this.batches.push(batch);
        this.openBatch = batch;
        return batchId;
      }),
    );
  }

  /**
   * Close a batch. Membership is `componentIds` when given, otherwise the
   * components that rendered while it was open.
   */
  recordBatchEnd(batchId: number, componentIds?: readonly number[]): boolean {
    return bestEffort(log, "recordBatchEnd", false, () =>
      this.section.run(() => {
        if (!this.recording) return false;
        const batch = this.findBatch(batchId);
        if (!batch || batch.endRelativeMs !== null) return false;

        batch.componentIds = componentIds ? [...componentIds] : [...batch.members];
        batch.endRelativeMs = this.relativeNow();

        this.append({
          componentId: SESSION_COMPONENT_ID,
          componentName: BATCH_COMPONENT_NAME,
          kind: TimelineEventKind.BatchCompleted,
          durationMs: batch.endRelativeMs - batch.startRelativeMs,
          metadata: {
            batchId: String(batchId),
            componentCount: String(batch.componentIds.length),
          },
        }, batchId, batch.startEventId);

        if (this.openBatch === batch) this.openBatch = null;
        return true;
      }),
    );
  }

  /** Render observed through introspection for a Basic-mode component. */
  recordBasicRender(componentId: number, componentName: string, sessionId?: string): number {
    return this.recordEvent({
      componentId,
      componentName,
      kind: TimelineEventKind.BasicRender,
      isEnhanced: false,
      sessionId: sessionId ?? null,
    });
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Queries
  // ──────────────────────────────────────────────────────────────────────────

  getEvents(): TimelineEventDto[] {
    return this.section.run(() => this.events.toArray().map(toEventDto));
  }

  /** Events with an id greater than `eventId`, for incremental polling. */
  getEventsSince(eventId: number): TimelineEventDto[] {
    return this.section.run(() =>
      this.events
        .toArray()
        .filter((event) => event.eventId > eventId)
        .map(toEventDto),
    );
  }

  /** Events whose relative time falls in `[startMs, endMs]`. */
  getEventsInRange(startMs: number, endMs: number): TimelineEventDto[] {
    return this.section.run(() =>
      this.events
        .toArray()
        .filter((event) => event.relativeMs >= startMs && event.relativeMs <= endMs)
        .map(toEventDto),
    );
  }

  getEventsForComponent(componentId: number): TimelineEventDto[] {
    return this.section.run(() =>
      this.events
        .toArray()
        .filter((event) => event.componentId === componentId)
        .map(toEventDto),
    );
  }

  getBatches(): RenderBatchDto[] {
    return this.section.run(() => this.batches.toArray().map(toBatchDto));
  }

  /**
   * Timed renders grouped by component, by descending total render time,
   * then ascending component id.
   */
  getRankedComponents(): ComponentRankingDto[] {
    return this.section.run(() => {
      const groups = new Map<string, ComponentRankingDto>();
      for (const event of this.events) {
        if (event.kind !== TimelineEventKind.Render || event.durationMs === null) continue;
        const key = `${event.componentId}\u0000${event.componentName}`;
        const group = groups.get(key);
        if (!group) {
          groups.set(key, {
            componentId: event.componentId,
            componentName: event.componentName,
            totalRenderMs: event.durationMs,
            renderCount: 1,
            averageRenderMs: event.durationMs,
            maxRenderMs: event.durationMs,
            minRenderMs: event.durationMs,
          });
          continue;
        }
        group.totalRenderMs += event.durationMs;
        group.renderCount++;
        group.averageRenderMs = group.totalRenderMs / group.renderCount;
        group.maxRenderMs = Math.max(group.maxRenderMs, event.durationMs);
        group.minRenderMs = Math.min(group.minRenderMs, event.durationMs);
      }
      return [...groups.values()].sort(
        (a, b) => b.totalRenderMs - a.totalRenderMs || a.componentId - b.componentId,
      );
    });
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Internals
  // ──────────────────────────────────────────────────────────────────────────

  private reset(): void {
    this.events.clear();
    this.batches.clear();
    this.lastEventId = 0;
    this.lastBatchId = 0;
    this.openBatch = null;
    this.lastInvalidation.clear();
    this.lastCallback.clear();
    this.lastParametersSet.clear();
    this.originMs = this.clock.now();
    this.startedAt = this.clock.wallTime();
  }

  private forgetCorrelation(key: string): void {
    this.lastInvalidation.delete(key);
    this.lastCallback.delete(key);
    this.lastParametersSet.delete(key);
  }

  private relativeNow(): number {
    return this.clock.now() - this.originMs;
  }

  private append(
    input: RecordEventInput,
    batchId: number | null = this.openBatch?.batchId ?? null,
    parentEventId: number | null = this.openBatch?.startEventId ?? null,
  ): number {
    const eventId = ++this.lastEventId;
    const relativeMs = this.relativeNow();
    const durationMs = input.durationMs ?? null;
    const correlation = this.correlate(input, eventId);

    const event: TimelineEvent = {
      eventId,
      timestamp: this.clock.wallTime(),
      relativeMs,
      componentId: input.componentId,
      componentName: input.componentName,
      kind: input.kind,
      durationMs,
      endRelativeMs: durationMs === null ? null : relativeMs + durationMs,
      parentEventId,
      triggeringEventId: correlation.triggeringEventId,
      trigger: correlation.trigger,
      triggerDetails: input.triggerDetails ?? correlation.details,
      isAsync: input.isAsync ?? false,
      isFirstRender: input.isFirstRender ?? false,
      wasSuppressed: input.wasSuppressed ?? false,
      isEnhanced: input.isEnhanced ?? true,
      batchId,
      sessionId: input.sessionId ?? null,
      metadata: input.metadata ? { ...input.metadata } : null,
    };

    this.events.push(event);
    if (input.kind === TimelineEventKind.Render && input.componentId >= 0) {
      this.openBatch?.members.add(input.componentId);
    }
    this.notify(event);
    return eventId;
  }

  /**
   * Attribute a render and update the per-component indices.
   */
  private correlate(input: RecordEventInput, eventId: number): Correlation {
    const key = input.correlationKey ?? `id:${input.componentId}`;
    const none: Correlation = { trigger: RenderTrigger.Unknown, triggeringEventId: null, details: null };

    switch (input.kind) {
      case TimelineEventKind.Invalidation:
        this.lastInvalidation.set(key, eventId);
        return none;
      case TimelineEventKind.CallbackInvoked:
        this.lastCallback.set(key, eventId);
        return none;
      case TimelineEventKind.ParametersSet:
        this.lastParametersSet.set(key, eventId);
        return none;
      case TimelineEventKind.Dispose:
        this.forgetCorrelation(key);
        return none;
      case TimelineEventKind.Render:
        break;
      default:
        return none;
    }

    const invalidation = this.lastInvalidation.get(key);
    const callback = this.lastCallback.get(key);
    const parametersSet = this.lastParametersSet.get(key);
    this.forgetCorrelation(key);

    if (input.isFirstRender) {
      return { trigger: RenderTrigger.FirstRender, triggeringEventId: null, details: "First render" };
    }
    if (invalidation !== undefined) {
      return {
        trigger: RenderTrigger.Invalidation,
        triggeringEventId: invalidation,
        details: "State invalidated",
      };
    }
    if (callback !== undefined) {
      return {
        trigger: RenderTrigger.CallbackInvoked,
        triggeringEventId: callback,
        details: this.describeCallback(callback),
      };
    }
    if (parametersSet !== undefined) {
      return {
        trigger: RenderTrigger.ParameterChanged,
        triggeringEventId: parametersSet,
        details: "Parameters set",
      };
    }
    return { trigger: RenderTrigger.ParentRerendered, triggeringEventId: null, details: "Parent re-rendered" };
  }

  private describeCallback(eventId: number): string {
    const name = this.findEvent(eventId)?.metadata?.callback;
    return name ? `Callback ${name}` : "Event callback";
  }

  /** Ids are gapless, so the position is the offset from the oldest id. */
  private findEvent(eventId: number): TimelineEvent | undefined {
    const oldest = this.events.first();
    if (!oldest) return undefined;
    const event = this.events.at(eventId - oldest.eventId);
    return event?.eventId === eventId ? event : undefined;
  }

  private findBatch(batchId: number): RenderBatch | undefined {
    const oldest = this.batches.first();
    if (!oldest) return undefined;
    const batch = this.batches.at(batchId - oldest.batchId);
    return batch?.batchId === batchId ? batch : undefined;
  }

  private notify(event: TimelineEvent): void {
    if (this.listeners.size === 0) return;
    const dto = toEventDto(event);
    for (const listener of this.listeners) {
      try {
        listener(dto);
      } catch (error) {
        log.warn({ err: error }, "Timeline listener failed");
      }
    }
  }
}
