/**
 * Lifecycle Metrics
 *
 * Per-component timers and counters, updated synchronously from lifecycle
 * hooks. Only stored counters live here; every ratio and average is computed
 * in {@link LifecycleMetrics.snapshot} so derived values cannot drift from
 * the counters they come from.
 *
 * @module @shadowtree/core/metrics
 */

import type { Clock } from "@shadowtree/kernel";
import { systemClock } from "@shadowtree/kernel";
import type { MetricsSnapshot, PhaseTimingDto } from "@shadowtree/shared";

// ============================================================================
// Vocabularies
// ============================================================================

export const LifecyclePhase = {
  Initialize: "initialize",
  InitializeAsync: "initialize-async",
  ParametersSet: "parameters-set",
  ParametersSetAsync: "parameters-set-async",
  /** The whole parameter pass, including both parameters-set phases */
  SetParameters: "set-parameters",
  Render: "render",
  PostRender: "post-render",
  PostRenderAsync: "post-render-async",
  EventCallback: "event-callback",
} as const;

export type LifecyclePhase = (typeof LifecyclePhase)[keyof typeof LifecyclePhase];

export const InvalidationOutcome = {
  Honored: "honored",
  /** A render was already queued */
  SuppressedAlreadyQueued: "suppressed-already-queued",
  /** The render gate declined */
  SuppressedByPolicy: "suppressed-by-policy",
} as const;

export type InvalidationOutcome = (typeof InvalidationOutcome)[keyof typeof InvalidationOutcome];

/**
 * Classify one invalidation call. An already-queued render wins over a
 * declined render gate.
 */
export function classifyInvalidation(
  renderAlreadyQueued: boolean,
  gateDeclined: boolean,
): InvalidationOutcome {
  if (renderAlreadyQueued) return InvalidationOutcome.SuppressedAlreadyQueued;
  if (gateDeclined) return InvalidationOutcome.SuppressedByPolicy;
  return InvalidationOutcome.Honored;
}

// ============================================================================
// Accumulator
// ============================================================================

class PhaseTiming {
  calls = 0;
  /** Calls that came with a duration; the average divides by these */
  timedCalls = 0;
  lastMs: number | null = null;
  totalMs = 0;

  record(ms: number): void {
    this.calls++;
    this.timedCalls++;
    this.lastMs = ms;
    this.totalMs += ms;
  }

  count(): void {
    this.calls++;
  }

  toDto(): PhaseTimingDto {
    return {
      calls: this.calls,
      lastMs: this.lastMs,
      totalMs: this.totalMs,
      averageMs: ratio(this.totalMs, this.timedCalls),
    };
  }
}

function ratio(numerator: number, denominator: number, scale = 1): number | null {
  return denominator > 0 ? (numerator / denominator) * scale : null;
}

export class LifecycleMetrics {
  private readonly phases = new Map<LifecyclePhase, PhaseTiming>();

  private readonly createdAtMs: number;
  private readonly createdAtWall: number;
  private disposedAtMs: number | null = null;
  private disposedAtWall: number | null = null;

  private maxRenderMs: number | null = null;
  private minRenderMs: number | null = null;
  private lastRenderedAt: number | null = null;
  private timeToFirstRenderMs: number | null = null;

  private invalidations = 0;
  private honored = 0;
  private suppressedAlreadyQueued = 0;
  private suppressedByPolicy = 0;

  private gateAllowed = 0;
  private gateDeclined = 0;
  private lastGateResult: boolean | null = null;

  constructor(private readonly clock: Clock = systemClock) {
    this.createdAtMs = clock.now();
    this.createdAtWall = clock.wallTime();
    for (const phase of Object.values(LifecyclePhase)) {
      this.phases.set(phase, new PhaseTiming());
    }
  }

  get renderCount(): number {
    return this.phase(LifecyclePhase.Render).calls;
  }

  get isDisposed(): boolean {
    return this.disposedAtMs !== null;
  }

  /**
   * Record one call of `phase`. Negative and non-finite durations are
   * ignored.
   */
  recordDuration(phase: LifecyclePhase, ms: number): void {
    if (!Number.isFinite(ms) || ms < 0) return;

    this.phase(phase).record(ms);
    if (phase !== LifecyclePhase.Render) return;

    this.maxRenderMs = this.maxRenderMs === null ? ms : Math.max(this.maxRenderMs, ms);
    this.minRenderMs = this.minRenderMs === null ? ms : Math.min(this.minRenderMs, ms);
    this.noteRender();
  }

  /**
   * Count one call of `phase` without a duration, for when timing is off.
   * Render calls still stamp the last-render and first-render times.
   */
  recordCall(phase: LifecyclePhase): void {
    this.phase(phase).count();
    if (phase === LifecyclePhase.Render) this.noteRender();
  }

  recordInvalidation(renderAlreadyQueued: boolean, gateDeclined: boolean): InvalidationOutcome {
    const outcome = classifyInvalidation(renderAlreadyQueued, gateDeclined);
    this.invalidations++;
    switch (outcome) {
      case InvalidationOutcome.Honored:
        this.honored++;
        break;
      case InvalidationOutcome.SuppressedAlreadyQueued:
        this.suppressedAlreadyQueued++;
        break;
      case InvalidationOutcome.SuppressedByPolicy:
        this.suppressedByPolicy++;
        break;
    }
    return outcome;
  }

  recordRenderGate(allowed: boolean): void {
    if (allowed) {
      this.gateAllowed++;
    } else {
      this.gateDeclined++;
    }
    this.lastGateResult = allowed;
  }

  /** Stamp disposal. Later calls keep the first stamp. */
  markDisposed(): void {
    if (this.disposedAtMs !== null) return;
    this.disposedAtMs = this.clock.now();
    this.disposedAtWall = this.clock.wallTime();
  }

  snapshot(): MetricsSnapshot {
    const render = this.phase(LifecyclePhase.Render);
    const elapsedMs = (this.disposedAtMs ?? this.clock.now()) - this.createdAtMs;
    const suppressed = this.suppressedAlreadyQueued + this.suppressedByPolicy;
    const gateDecisions = this.gateAllowed + this.gateDeclined;

    return {
      createdAt: this.createdAtWall,
      disposedAt: this.disposedAtWall,

      initialize: this.phase(LifecyclePhase.Initialize).toDto(),
      initializeAsync: this.phase(LifecyclePhase.InitializeAsync).toDto(),
      parametersSet: this.phase(LifecyclePhase.ParametersSet).toDto(),
      parametersSetAsync: this.phase(LifecyclePhase.ParametersSetAsync).toDto(),
      setParameters: this.phase(LifecyclePhase.SetParameters).toDto(),
      render: render.toDto(),
      postRender: this.phase(LifecyclePhase.PostRender).toDto(),
      postRenderAsync: this.phase(LifecyclePhase.PostRenderAsync).toDto(),
      eventCallback: this.phase(LifecyclePhase.EventCallback).toDto(),

      maxRenderMs: this.maxRenderMs,
      minRenderMs: this.minRenderMs,
      lastRenderedAt: this.lastRenderedAt,
      timeToFirstRenderMs: this.timeToFirstRenderMs,

      invalidations: {
        total: this.invalidations,
        honored: this.honored,
        suppressedAlreadyQueued: this.suppressedAlreadyQueued,
        suppressedByPolicy: this.suppressedByPolicy,
      },
      renderGate: {
        allowed: this.gateAllowed,
        declined: this.gateDeclined,
        lastResult: this.lastGateResult,
      },

      lifetimeMs: this.disposedAtMs === null ? null : this.disposedAtMs - this.createdAtMs,
      invalidationEfficiency: ratio(render.calls, this.invalidations, 100),
      suppressionRatio: ratio(suppressed, this.invalidations, 100),
      renderGateBlockRate: ratio(this.gateDeclined, gateDecisions, 100),
      rendersPerMinute: elapsedMs > 0 ? render.calls / (elapsedMs / 60_000) : null,
      totalLifecycleMs:
        (this.phase(LifecyclePhase.Initialize).lastMs ?? 0) +
        (this.phase(LifecyclePhase.ParametersSet).lastMs ?? 0) +
        render.totalMs +
        (this.phase(LifecyclePhase.PostRender).lastMs ?? 0),
    };
  }

  private noteRender(): void {
    this.lastRenderedAt = this.clock.wallTime();
    if (this.timeToFirstRenderMs === null) {
      this.timeToFirstRenderMs = this.clock.now() - this.createdAtMs;
    }
  }

  private phase(phase: LifecyclePhase): PhaseTiming {
    let timing = this.phases.get(phase);
    if (!timing) {
      timing = new PhaseTiming();
      this.phases.set(phase, timing);
    }
    return timing;
  }
}
