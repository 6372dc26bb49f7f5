/**
 * Component Instrumentation
 *
 * Adapter between the host's lifecycle hooks and the engine. One instance
 * serves one session: it feeds the session's registry, the shared timeline
 * recorder and, when present, the push channel.
 *
 * Every hook is wrapped in {@link bestEffort}. A failure inside the engine
 * costs data, never a host render. Once the session's registry is disposed
 * the hooks record nothing.
 *
 * @example
 * ```typescript
 * const hooks = new ComponentInstrumentation({ registry, recorder });
 *
 * hooks.onCreate(component, { name: "Counter", fullName: "App.Counter" });
 * hooks.onAttach(component, 7);
 * hooks.onRender(component, 0.8);
 * ```
 *
 * @module @shadowtree/core/instrumentation
 */

import { Logger, bestEffort, systemClock, type Clock } from "@shadowtree/kernel";
import {
  ComponentMode,
  TimelineEventKind,
  serializeEventKind,
  type ComponentTypeInfo,
} from "@shadowtree/shared";
import {
  InvalidationOutcome,
  LifecyclePhase,
  classifyInvalidation,
} from "../metrics/lifecycle-metrics.js";
import type { LifecycleEventChannel } from "../push/event-channel.js";
import type { ComponentRecord } from "../registry/component-record.js";
import type { ComponentRegistry } from "../registry/registry.js";
import type { TimelineRecorder } from "../timeline/timeline-recorder.js";
import { NOT_RECORDING, SESSION_COMPONENT_ID } from "../timeline/types.js";

const log = Logger.for("Instrumentation");

export interface ComponentInstrumentationOptions {
  registry: ComponentRegistry;
  recorder: TimelineRecorder;
  channel?: LifecycleEventChannel;
  clock?: Clock;
  /** Record phase durations (default: true) */
  timingEnabled?: boolean;
}

export interface InvalidationContext {
  /** A render for the component is already queued */
  renderAlreadyQueued: boolean;
  /** The component's render gate returned false */
  gateDeclined: boolean;
}

export interface PhaseOptions {
  isAsync?: boolean;
}

interface EmitOptions {
  durationMs?: number | null;
  isAsync?: boolean;
  isFirstRender?: boolean;
  wasSuppressed?: boolean;
  metadata?: Record<string, string>;
}

export class ComponentInstrumentation {
  readonly registry: ComponentRegistry;
  private readonly recorder: TimelineRecorder;
  private readonly channel: LifecycleEventChannel | null;
  private readonly clock: Clock;
  private readonly timingEnabled: boolean;
  private readonly rendered = new WeakSet<ComponentRecord>();

  constructor(options: ComponentInstrumentationOptions) {
    this.registry = options.registry;
    this.recorder = options.recorder;
    this.channel = options.channel ?? null;
    this.clock = options.clock ?? systemClock;
    this.timingEnabled = options.timingEnabled ?? true;
  }

  get sessionId(): string {
    return this.registry.sessionId;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Identity
  // ──────────────────────────────────────────────────────────────────────────

  onCreate(
    instance: unknown,
    typeInfo: ComponentTypeInfo,
    mode: ComponentMode = ComponentMode.Enhanced,
  ): void {
    bestEffort(log, "onCreate", undefined, () => {
      this.registry.registerPending(instance, typeInfo, mode);
    });
  }

  onAttach(instance: unknown, componentId: number): void {
    bestEffort(log, "onAttach", undefined, () => {
      this.registry.resolveDirect(instance, componentId);
    });
  }

  onDispose(instance: unknown): void {
    bestEffort(log, "onDispose", undefined, () => {
      const record = this.registry.recordFor(instance);
      if (record) {
        this.emit(record, TimelineEventKind.Dispose);
      }
      this.registry.unregister(instance);
    });
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Lifecycle phases
  // ──────────────────────────────────────────────────────────────────────────

  onInitialize(instance: unknown, durationMs: number, options: PhaseOptions = {}): void {
    this.phase("onInitialize", instance, durationMs, options, {
      sync: LifecyclePhase.Initialize,
      async: LifecyclePhase.InitializeAsync,
      kind: TimelineEventKind.Initialize,
    });
  }

  onParametersSet(instance: unknown, durationMs: number, options: PhaseOptions = {}): void {
    this.phase("onParametersSet", instance, durationMs, options, {
      sync: LifecyclePhase.ParametersSet,
      async: LifecyclePhase.ParametersSetAsync,
      kind: TimelineEventKind.ParametersSet,
    });
  }

  /** Whole parameter pass. Metrics only; the phases inside it emit events. */
  onSetParameters(instance: unknown, durationMs: number): void {
    bestEffort(log, "onSetParameters", undefined, () => {
      const record = this.registry.recordFor(instance);
      if (record) this.measure(record, LifecyclePhase.SetParameters, durationMs);
    });
  }

  onRender(instance: unknown, durationMs: number): void {
    bestEffort(log, "onRender", undefined, () => {
      const record = this.registry.recordFor(instance);
      if (!record) return;

      const isFirstRender = !this.rendered.has(record);
      this.rendered.add(record);
      this.measure(record, LifecyclePhase.Render, durationMs);
      this.emit(record, TimelineEventKind.Render, {
        durationMs: this.timed(durationMs),
        isFirstRender,
      });
    });
  }

  onPostRender(
    instance: unknown,
    durationMs: number,
    options: PhaseOptions & { firstRender?: boolean } = {},
  ): void {
    bestEffort(log, "onPostRender", undefined, () => {
      const record = this.registry.recordFor(instance);
      if (!record) return;

      this.measure(
        record,
        options.isAsync ? LifecyclePhase.PostRenderAsync : LifecyclePhase.PostRender,
        durationMs,
      );
      this.emit(record, TimelineEventKind.PostRender, {
        durationMs: this.timed(durationMs),
        isAsync: options.isAsync ?? false,
        isFirstRender: options.firstRender ?? false,
      });
    });
  }

  onCallback(instance: unknown, durationMs: number, callbackName?: string): void {
    bestEffort(log, "onCallback", undefined, () => {
      const record = this.registry.recordFor(instance);
      if (!record) return;

      this.measure(record, LifecyclePhase.EventCallback, durationMs);
      this.emit(record, TimelineEventKind.CallbackInvoked, {
        durationMs: this.timed(durationMs),
        metadata: callbackName ? { callback: callbackName } : undefined,
      });
    });
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Invalidation and render gate
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Record an invalidation call. Returns how it was classified, or null for
   * an unknown instance.
   */
  onInvalidate(instance: unknown, context: InvalidationContext): InvalidationOutcome | null {
    return bestEffort<InvalidationOutcome | null>(log, "onInvalidate", null, () => {
      const record = this.registry.recordFor(instance);
      if (!record) return null;

      const outcome =
        record.metrics?.recordInvalidation(context.renderAlreadyQueued, context.gateDeclined) ??
        classifyInvalidation(context.renderAlreadyQueued, context.gateDeclined);

      if (outcome === InvalidationOutcome.Honored) {
        this.emit(record, TimelineEventKind.Invalidation);
      } else {
        this.emit(record, TimelineEventKind.InvalidationSuppressed, {
          wasSuppressed: true,
          metadata: { reason: outcome },
        });
      }
      return outcome;
    });
  }

  onRenderGate(instance: unknown, allowed: boolean): void {
    bestEffort(log, "onRenderGate", undefined, () => {
      this.registry.recordFor(instance)?.metrics?.recordRenderGate(allowed);
    });
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Session-level
  // ──────────────────────────────────────────────────────────────────────────

  beginBatch(triggerSource?: string): number {
    if (this.registry.isDisposed) return NOT_RECORDING;
    return bestEffort(log, "beginBatch", NOT_RECORDING, () =>
      this.recorder.recordBatchStart(triggerSource),
    );
  }

  endBatch(batchId: number, componentIds?: readonly number[]): void {
    bestEffort(log, "endBatch", undefined, () => {
      if (this.registry.isDisposed) return;
      this.recorder.recordBatchEnd(batchId, componentIds);
    });
  }

  /** A render seen through introspection for a component without hooks. */
  onBasicRender(componentId: number): void {
    bestEffort(log, "onBasicRender", undefined, () => {
      if (this.registry.isDisposed) return;
      this.registry.recordBasicRender(componentId);
      const record = this.registry.recordById(componentId);
      const name = record?.typeInfo.name ?? "Unknown";
      this.recorder.recordBasicRender(componentId, name, this.sessionId);
      this.publish(componentId, name, TimelineEventKind.BasicRender, {});
    });
  }

  onNavigation(location: string): void {
    bestEffort(log, "onNavigation", undefined, () => {
      if (this.registry.isDisposed) return;
      const metadata = { location };
      this.recorder.recordEvent({
        componentId: SESSION_COMPONENT_ID,
        componentName: "[Navigation]",
        kind: TimelineEventKind.Navigation,
        sessionId: this.sessionId,
        metadata,
      });
      this.publish(SESSION_COMPONENT_ID, "[Navigation]", TimelineEventKind.Navigation, { metadata });
    });
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Internals
  // ──────────────────────────────────────────────────────────────────────────

  private phase(
    operation: string,
    instance: unknown,
    durationMs: number,
    options: PhaseOptions,
    target: { sync: LifecyclePhase; async: LifecyclePhase; kind: TimelineEventKind },
  ): void {
    bestEffort(log, operation, undefined, () => {
      const record = this.registry.recordFor(instance);
      if (!record) return;

      this.measure(record, options.isAsync ? target.async : target.sync, durationMs);
      this.emit(record, target.kind, {
        durationMs: this.timed(durationMs),
        isAsync: options.isAsync ?? false,
      });
    });
  }

  /** With timing off the call still counts, without a duration. */
  private measure(record: ComponentRecord, phase: LifecyclePhase, durationMs: number): void {
    if (this.timingEnabled) {
      record.metrics?.recordDuration(phase, durationMs);
    } else {
      record.metrics?.recordCall(phase);
    }
  }

  private timed(durationMs: number): number | null {
    return this.timingEnabled ? durationMs : null;
  }

  private emit(record: ComponentRecord, kind: TimelineEventKind, options: EmitOptions = {}): void {
    const componentId = record.componentId ?? SESSION_COMPONENT_ID;
    this.recorder.recordEvent({
      componentId,
      componentName: record.typeInfo.name,
      kind,
      durationMs: options.durationMs ?? null,
      isAsync: options.isAsync,
      isFirstRender: options.isFirstRender,
      wasSuppressed: options.wasSuppressed,
      isEnhanced: record.isEnhanced,
      sessionId: this.sessionId,
      correlationKey: record.key,
      metadata: options.metadata,
    });
    this.publish(componentId, record.typeInfo.name, kind, options);
  }

  private publish(
    componentId: number,
    componentName: string,
    kind: TimelineEventKind,
    options: EmitOptions,
  ): void {
    this.channel?.publish({
      sessionId: this.sessionId,
      componentId,
      componentName,
      kind: serializeEventKind(kind),
      durationMs: options.durationMs ?? null,
      timestamp: this.clock.wallTime(),
      isFirstRender: options.isFirstRender ?? false,
      metadata: options.metadata ?? null,
    });
  }
}
