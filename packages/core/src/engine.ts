/**
 * Engine assembly: one recorder, one session manager and an optional push
 * channel built from validated configuration.
 *
 * @example
 * ```typescript
 * const engine = createShadowtree({ config: { timeline: { maxEvents: 2000 } } });
 * const hooks = engine.instrument("circuit-1", createReflectiveIntrospector(renderer));
 * engine.recorder.startRecording();
 * ```
 */

import {
  Logger,
  loadConfig,
  systemClock,
  type Clock,
  type ShadowtreeConfig,
  type ShadowtreeConfigInput,
} from "@shadowtree/kernel";
import type { ComponentDetails } from "@shadowtree/shared";
import type { HostTreeIntrospector } from "./host/introspector.js";
import { ComponentInstrumentation } from "./instrumentation/instrumentation.js";
import { LifecycleEventChannel } from "./push/event-channel.js";
import { SessionManager } from "./session/session-manager.js";
import { TimelineRecorder } from "./timeline/timeline-recorder.js";

const log = Logger.for("Shadowtree");

export interface ShadowtreeOptions {
  config?: ShadowtreeConfigInput;
  env?: NodeJS.ProcessEnv;
  clock?: Clock;
  /** Apply `config.log.level` to the root logger (default: true) */
  configureLogging?: boolean;
  /** Reads parameters, tracked state and lifecycle flags for summaries */
  describeInstance?: (instance: object) => ComponentDetails;
}

export interface Shadowtree {
  readonly config: ShadowtreeConfig;
  readonly recorder: TimelineRecorder;
  readonly sessions: SessionManager;
  /** Null when push is disabled */
  readonly channel: LifecycleEventChannel | null;
  /** Open (or reuse) a session and return hooks bound to it. */
  instrument(sessionId: string, introspector?: HostTreeIntrospector): ComponentInstrumentation;
  /** Close every session. The recorder keeps its events. */
  shutdown(): void;
}

/**
 * @throws ConfigError when the configuration is invalid
 */
export function createShadowtree(options: ShadowtreeOptions = {}): Shadowtree {
  const config = loadConfig(options.config, options.env);
  if (options.configureLogging ?? true) {
    Logger.configure({ level: config.log.level });
  }

  const clock = options.clock ?? systemClock;
  const recorder = new TimelineRecorder({
    clock,
    maxEvents: config.timeline.maxEvents,
    maxBatches: config.timeline.maxBatches,
  });
  const hooks = new Map<string, ComponentInstrumentation>();
  const sessions = new SessionManager({
    recorder,
    clock,
    minReconcileIntervalMs: config.reconcile.minIntervalMs,
    describeInstance: options.describeInstance,
    onSessionClosed: (sessionId) => {
      hooks.delete(sessionId);
    },
  });
  const channel = config.push.enabled ? LifecycleEventChannel.fromConfig(config.push) : null;

  log.debug(
    { maxEvents: config.timeline.maxEvents, push: config.push.enabled },
    "Engine created",
  );

  return {
    config,
    recorder,
    sessions,
    channel,
    instrument(sessionId, introspector) {
      const registry = sessions.open(sessionId, introspector);
      const existing = hooks.get(sessionId);
      if (existing && existing.registry === registry) {
        return existing;
      }
      const created = new ComponentInstrumentation({
        registry,
        recorder,
        channel: channel ?? undefined,
        clock,
        timingEnabled: config.timing.enabled,
      });
      hooks.set(sessionId, created);
      return created;
    },
    shutdown() {
      sessions.closeAll();
    },
  };
}
