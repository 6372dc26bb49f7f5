/**
 * Lifecycle Event Channel
 *
 * Forwards lifecycle events to an inspector-facing sink as they happen,
 * alongside the polled timeline. Events published while no sink is attached,
 * or while the sink reports it is not ready, wait in a bounded buffer
 * (oldest dropped first) and are flushed in order once delivery works.
 *
 * A sink that reports {@link HostDisconnectedError} loses the event; there
 * is no retry.
 *
 * @module @shadowtree/core/push
 */

import { Logger, type ShadowtreeConfig } from "@shadowtree/kernel";
import {
  isHostDisconnected,
  isSinkNotReady,
  parseEventKind,
  serializeEventKind,
  type TimelineEventKind,
  type TimelineEventKindName,
} from "@shadowtree/shared";

const log = Logger.for("LifecycleEventChannel");

export interface LifecycleEvent {
  sessionId: string | null;
  componentId: number;
  componentName: string;
  kind: TimelineEventKindName;
  durationMs: number | null;
  /** Epoch milliseconds */
  timestamp: number;
  isFirstRender: boolean;
  metadata: Record<string, string> | null;
}

export interface LifecycleEventSink {
  /**
   * Deliver one event. Throw {@link SinkNotReadyError} to have it buffered,
   * {@link HostDisconnectedError} to have it dropped.
   */
  send(event: LifecycleEvent): void;
}

export interface LifecycleEventChannelOptions {
  /** Default: true */
  enabled?: boolean;
  /** Events with a positive duration below this are dropped (default: 0) */
  minDurationMs?: number;
  /** Kinds to forward; all when absent */
  kinds?: readonly TimelineEventKind[];
  /** Component type names never forwarded */
  excludedTypes?: readonly string[];
  /** Default: 100 */
  maxBuffered?: number;
}

type Delivery = "sent" | "not-ready" | "dropped";

export class LifecycleEventChannel {
  private readonly enabled: boolean;
  private readonly minDurationMs: number;
  private readonly kinds: ReadonlySet<TimelineEventKindName> | null;
  private readonly excludedTypes: ReadonlySet<string>;
  private readonly maxBuffered: number;

  private sink: LifecycleEventSink | null = null;
  private buffer: LifecycleEvent[] = [];

  constructor(options: LifecycleEventChannelOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.minDurationMs = options.minDurationMs ?? 0;
    this.kinds = options.kinds ? new Set(options.kinds.map(serializeEventKind)) : null;
    this.excludedTypes = new Set(options.excludedTypes ?? []);
    this.maxBuffered = options.maxBuffered ?? 100;
  }

  static fromConfig(push: ShadowtreeConfig["push"]): LifecycleEventChannel {
    const kinds = push.kinds
      ?.map(parseEventKind)
      .filter((kind): kind is TimelineEventKind => kind !== undefined);
    return new LifecycleEventChannel({
      enabled: push.enabled,
      minDurationMs: push.minDurationMs,
      kinds,
      excludedTypes: push.excludedTypes,
      maxBuffered: push.maxBuffered,
    });
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  get bufferedCount(): number {
    return this.buffer.length;
  }

  /** Attach a sink and flush whatever was buffered. */
  attach(sink: LifecycleEventSink): void {
    this.sink = sink;
    this.flush();
  }

  detach(): void {
    this.sink = null;
  }

  /**
   * Offer an event. Returns false when a filter rejected it.
   */
  publish(event: LifecycleEvent): boolean {
    if (!this.accepts(event)) return false;

    if (this.sink === null || this.buffer.length > 0) {
      this.enqueue(event);
      this.flush();
      return true;
    }
    if (this.deliver(this.sink, event) === "not-ready") {
      this.enqueue(event);
    }
    return true;
  }

  /**
   * Deliver buffered events in order, stopping at the first the sink is not
   * ready for.
   */
  flush(): void {
    const sink = this.sink;
    if (sink === null) return;
    while (this.buffer.length > 0) {
      const [next] = this.buffer;
      if (this.deliver(sink, next) === "not-ready") return;
      this.buffer.shift();
    }
  }

  private accepts(event: LifecycleEvent): boolean {
    if (!this.enabled) return false;
    if (
      event.durationMs !== null &&
      event.durationMs > 0 &&
      event.durationMs < this.minDurationMs
    ) {
      return false;
    }
    if (this.kinds !== null && !this.kinds.has(event.kind)) return false;
    return !this.excludedTypes.has(event.componentName);
  }

  private enqueue(event: LifecycleEvent): void {
    this.buffer.push(event);
    if (this.buffer.length > this.maxBuffered) {
      this.buffer.shift();
    }
  }

  private deliver(sink: LifecycleEventSink, event: LifecycleEvent): Delivery {
    try {
      sink.send(event);
      return "sent";
    } catch (error) {
      if (isSinkNotReady(error)) {
        return "not-ready";
      }
      if (isHostDisconnected(error)) {
        log.debug({ kind: event.kind }, "Sink disconnected, event dropped");
        return "dropped";
      }
      log.warn({ err: error, kind: event.kind }, "Sink failed, event dropped");
      return "dropped";
    }
  }
}
