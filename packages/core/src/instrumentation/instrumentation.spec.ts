import { describe, it, expect, beforeEach, vi } from "vitest";
import { createManualClock, type ManualClock } from "@shadowtree/kernel/testing";
import { ComponentMode, type ComponentTypeInfo } from "@shadowtree/shared";
import { createStaticIntrospector } from "../host/introspector.js";
import { LifecycleEventChannel, type LifecycleEvent } from "../push/event-channel.js";
import { ComponentRegistry } from "../registry/registry.js";
import { TimelineRecorder } from "../timeline/timeline-recorder.js";
import { ComponentInstrumentation } from "./instrumentation.js";

const EPOCH = 1_700_000_000_000;
const COUNTER: ComponentTypeInfo = { name: "Counter", fullName: "App.Counter" };

interface Harness {
  clock: ManualClock;
  recorder: TimelineRecorder;
  registry: ComponentRegistry;
  pushed: LifecycleEvent[];
  hooks: ComponentInstrumentation;
}

function setup(options: { timingEnabled?: boolean; registry?: ComponentRegistry } = {}): Harness {
  const clock = createManualClock({ epoch: EPOCH });
  const recorder = new TimelineRecorder({ clock });
  recorder.startRecording();
  const registry = options.registry ?? new ComponentRegistry({ sessionId: "s1", clock });
  const channel = new LifecycleEventChannel();
  const pushed: LifecycleEvent[] = [];
  channel.attach({ send: (event) => pushed.push(event) });
  const hooks = new ComponentInstrumentation({
    registry,
    recorder,
    channel,
    clock,
    timingEnabled: options.timingEnabled,
  });
  return { clock, recorder, registry, pushed, hooks };
}

function attached(h: Harness, componentId = 7): object {
  const component = {};
  h.hooks.onCreate(component, COUNTER);
  h.hooks.onAttach(component, componentId);
  return component;
}

describe("ComponentInstrumentation", () => {
  let h: Harness;

  beforeEach(() => {
    h = setup();
  });

  describe("identity hooks", () => {
    it("registers on create and resolves on attach", () => {
      const component = {};
      h.hooks.onCreate(component, COUNTER);
      expect(h.registry.getCounts()).toMatchObject({ pending: 1, resolved: 0 });

      h.hooks.onAttach(component, 7);
      expect(h.registry.getComponent(7)).toMatchObject({ typeName: "Counter", matchedBy: "direct" });
    });

    it("records dispose before forgetting the component", () => {
      const component = attached(h);
      h.hooks.onDispose(component);

      expect(h.recorder.getEvents()).toMatchObject([{ kind: "dispose", componentId: 7, sessionId: "s1" }]);
      expect(h.registry.getCounts().total).toBe(0);
    });

    it("ignores hooks for instances it never saw", () => {
      const stranger = {};
      h.hooks.onRender(stranger, 1);
      h.hooks.onInitialize(stranger, 1);
      h.hooks.onDispose(stranger);

      expect(h.hooks.onInvalidate(stranger, { renderAlreadyQueued: false, gateDeclined: false })).toBeNull();
      expect(h.recorder.getEvents()).toEqual([]);
      expect(h.pushed).toEqual([]);
    });

    it("uses the session id for events of pending components", () => {
      const component = {};
      h.hooks.onCreate(component, COUNTER);
      h.hooks.onInitialize(component, 2);

      expect(h.recorder.getEvents()[0]).toMatchObject({ componentId: -1, componentName: "Counter" });
    });
  });

  describe("lifecycle phases", () => {
    it("records durations on metrics and the timeline", () => {
      const component = attached(h);
      h.hooks.onInitialize(component, 3);
      h.hooks.onParametersSet(component, 4, { isAsync: true });
      h.hooks.onSetParameters(component, 6);
      h.hooks.onRender(component, 1.5);
      h.hooks.onPostRender(component, 0.5, { firstRender: true });

      const metrics = h.registry.getComponent(7)?.metrics;
      expect(metrics?.initialize).toEqual({ calls: 1, lastMs: 3, totalMs: 3, averageMs: 3 });
      expect(metrics?.parametersSetAsync.calls).toBe(1);
      expect(metrics?.parametersSet.calls).toBe(0);
      expect(metrics?.setParameters.totalMs).toBe(6);
      expect(metrics?.render.calls).toBe(1);
      expect(metrics?.postRender.calls).toBe(1);

      expect(h.recorder.getEvents()).toMatchObject([
        { kind: "initialize", durationMs: 3, isAsync: false },
        { kind: "parameters-set", durationMs: 4, isAsync: true },
        { kind: "render", durationMs: 1.5, isFirstRender: true, trigger: "first-render" },
        { kind: "post-render", durationMs: 0.5, isFirstRender: true },
      ]);
    });

    it("detects the first render per component", () => {
      const component = attached(h);
      h.hooks.onRender(component, 1);
      h.hooks.onRender(component, 1);

      expect(h.recorder.getEvents().map((e) => e.trigger)).toEqual(["first-render", "parent-rerendered"]);
    });

    it("records async post-render separately", () => {
      const component = attached(h);
      h.hooks.onPostRender(component, 9, { isAsync: true });

      const metrics = h.registry.getComponent(7)?.metrics;
      expect(metrics?.postRenderAsync.calls).toBe(1);
      expect(metrics?.postRender.calls).toBe(0);
      expect(h.recorder.getEvents()[0]).toMatchObject({ kind: "post-render", isAsync: true });
    });

    it("names the callback that caused a render", () => {
      const component = attached(h);
      h.hooks.onRender(component, 1);
      h.hooks.onCallback(component, 2, "OnClick");
      h.hooks.onRender(component, 1);

      const events = h.recorder.getEvents();
      expect(events[1]).toMatchObject({ kind: "callback-invoked", metadata: { callback: "OnClick" } });
      expect(events[2]).toMatchObject({ trigger: "callback-invoked", triggerDetails: "Callback OnClick" });
      expect(h.registry.getComponent(7)?.metrics?.eventCallback.calls).toBe(1);
    });

    it("records events without durations when timing is off", () => {
      h = setup({ timingEnabled: false });
      const component = attached(h);
      h.hooks.onRender(component, 5);

      expect(h.recorder.getEvents()[0]).toMatchObject({ durationMs: null, isFirstRender: true });
      expect(h.registry.getComponent(7)?.metrics?.render).toEqual({
        calls: 1,
        lastMs: null,
        totalMs: 0,
        averageMs: null,
      });
    });

    it("keeps counting calls and render times when timing is off", () => {
      h = setup({ timingEnabled: false });
      const component = attached(h);
      h.clock.advance(4);
      h.hooks.onInvalidate(component, { renderAlreadyQueued: false, gateDeclined: false });
      h.hooks.onRender(component, 5);
      h.hooks.onRender(component, 5);
      h.hooks.onCallback(component, 2, "OnClick");

      const metrics = h.registry.getComponent(7)?.metrics;
      expect(metrics?.render.calls).toBe(2);
      expect(metrics?.eventCallback.calls).toBe(1);
      expect(metrics?.invalidationEfficiency).toBe(200);
      expect(metrics?.timeToFirstRenderMs).toBe(4);
      expect(metrics?.lastRenderedAt).toBe(EPOCH + 4);
      expect(metrics?.maxRenderMs).toBeNull();
    });

    it("keeps Basic components free of metrics", () => {
      const component = {};
      h.hooks.onCreate(component, COUNTER, ComponentMode.Basic);
      h.hooks.onAttach(component, 7);
      h.hooks.onRender(component, 1);

      expect(h.registry.getComponent(7)?.metrics).toBeNull();
      expect(h.recorder.getEvents()[0]).toMatchObject({ kind: "render", isEnhanced: false });
    });
  });

  describe("invalidation", () => {
    it("records honored invalidations and links the next render", () => {
      const component = attached(h);
      h.hooks.onRender(component, 1);

      const outcome = h.hooks.onInvalidate(component, { renderAlreadyQueued: false, gateDeclined: false });
      h.hooks.onRender(component, 1);

      expect(outcome).toBe("honored");
      const events = h.recorder.getEvents();
      expect(events[1]).toMatchObject({ kind: "invalidation", wasSuppressed: false });
      expect(events[2]).toMatchObject({ trigger: "invalidation", triggeringEventId: events[1].eventId });
    });

    it("records suppressed invalidations with their reason", () => {
      const component = attached(h);
      const queued = h.hooks.onInvalidate(component, { renderAlreadyQueued: true, gateDeclined: true });
      const declined = h.hooks.onInvalidate(component, { renderAlreadyQueued: false, gateDeclined: true });

      expect(queued).toBe("suppressed-already-queued");
      expect(declined).toBe("suppressed-by-policy");
      expect(h.recorder.getEvents()).toMatchObject([
        { kind: "invalidation-suppressed", wasSuppressed: true, metadata: { reason: "suppressed-already-queued" } },
        { kind: "invalidation-suppressed", wasSuppressed: true, metadata: { reason: "suppressed-by-policy" } },
      ]);
      expect(h.registry.getComponent(7)?.metrics?.invalidations).toEqual({
        total: 2,
        honored: 0,
        suppressedAlreadyQueued: 1,
        suppressedByPolicy: 1,
      });
    });

    it("keeps trigger correlation apart for components that are still pending", () => {
      const a = {};
      const b = {};
      h.hooks.onCreate(a, COUNTER);
      h.hooks.onCreate(b, { name: "Clock", fullName: "App.Clock" });

      h.hooks.onRender(a, 1);
      h.hooks.onRender(b, 1);
      h.hooks.onInvalidate(a, { renderAlreadyQueued: false, gateDeclined: false });
      h.hooks.onRender(b, 1);
      h.hooks.onRender(a, 1);

      const events = h.recorder.getEvents();
      expect(events.map((e) => e.componentId)).toEqual([-1, -1, -1, -1, -1]);
      expect(events[3]).toMatchObject({
        componentName: "Clock",
        trigger: "parent-rerendered",
        triggeringEventId: null,
      });
      expect(events[4]).toMatchObject({
        componentName: "Counter",
        trigger: "invalidation",
        triggeringEventId: 3,
      });
    });

    it("links an invalidation made while pending to the render after attach", () => {
      const component = {};
      h.hooks.onCreate(component, COUNTER);
      h.hooks.onRender(component, 1);
      h.hooks.onInvalidate(component, { renderAlreadyQueued: false, gateDeclined: false });
      h.hooks.onAttach(component, 7);
      h.hooks.onRender(component, 1);

      expect(h.recorder.getEvents()[2]).toMatchObject({
        componentId: 7,
        trigger: "invalidation",
        triggeringEventId: 2,
      });
    });

    it("classifies invalidations of Basic components without metrics", () => {
      const component = {};
      h.hooks.onCreate(component, COUNTER, ComponentMode.Basic);
      expect(h.hooks.onInvalidate(component, { renderAlreadyQueued: true, gateDeclined: false })).toBe(
        "suppressed-already-queued",
      );
    });

    it("counts render gate decisions", () => {
      const component = attached(h);
      h.hooks.onRenderGate(component, true);
      h.hooks.onRenderGate(component, false);

      expect(h.registry.getComponent(7)?.metrics?.renderGate).toEqual({
        allowed: 1,
        declined: 1,
        lastResult: false,
      });
    });
  });

  describe("session-level events", () => {
    it("brackets renders in a batch", () => {
      const component = attached(h);
      const batchId = h.hooks.beginBatch("navigation");
      h.hooks.onRender(component, 1);
      h.hooks.endBatch(batchId);

      expect(batchId).toBe(1);
      expect(h.recorder.getBatches()[0]).toMatchObject({ componentIds: [7], triggerSource: "navigation" });
    });

    it("records navigation", () => {
      h.hooks.onNavigation("/orders/42");

      expect(h.recorder.getEvents()[0]).toMatchObject({
        kind: "navigation",
        componentId: -1,
        componentName: "[Navigation]",
        metadata: { location: "/orders/42" },
      });
      expect(h.pushed[0]).toMatchObject({ kind: "navigation", metadata: { location: "/orders/42" } });
    });

    it("records renders of Basic components seen through the host tree", () => {
      const clock = createManualClock({ epoch: EPOCH });
      const registry = new ComponentRegistry({
        sessionId: "s1",
        clock,
        introspector: createStaticIntrospector(() => [
          { componentId: 5, instance: null, parentId: null, typeInfo: { name: "Legacy", fullName: "App.Legacy" } },
        ]),
      });
      registry.reconcile({ force: true });
      h = setup({ registry });

      h.hooks.onBasicRender(5);

      expect(registry.recordById(5)?.basicRenderCount).toBe(1);
      expect(h.recorder.getEvents()[0]).toMatchObject({
        kind: "basic-render",
        componentId: 5,
        componentName: "Legacy",
        isEnhanced: false,
        sessionId: "s1",
      });
      expect(h.pushed[0]).toMatchObject({ kind: "basic-render", componentName: "Legacy" });
    });
  });

  it("pushes lifecycle events to the channel", () => {
    const component = attached(h);
    h.hooks.onRender(component, 1.5);

    expect(h.pushed).toEqual([
      {
        sessionId: "s1",
        componentId: 7,
        componentName: "Counter",
        kind: "render",
        durationMs: 1.5,
        timestamp: EPOCH,
        isFirstRender: true,
        metadata: null,
      },
    ]);
  });

  it("records nothing once the session's registry is disposed", () => {
    const component = attached(h);
    h.registry.dispose();

    h.hooks.onRender(component, 1);
    h.hooks.onNavigation("/orders/42");
    h.hooks.onBasicRender(7);
    const batchId = h.hooks.beginBatch("navigation");
    h.hooks.endBatch(batchId);

    expect(batchId).toBe(-1);
    expect(h.recorder.getEvents()).toEqual([]);
    expect(h.recorder.getBatches()).toEqual([]);
    expect(h.pushed).toEqual([]);
  });

  it("never lets an engine failure reach the host", () => {
    const component = attached(h);
    vi.spyOn(h.registry, "recordFor").mockImplementation(() => {
      throw new Error("registry broke");
    });

    expect(() => h.hooks.onRender(component, 1)).not.toThrow();
    expect(h.hooks.onInvalidate(component, { renderAlreadyQueued: false, gateDeclined: false })).toBeNull();
    expect(h.recorder.getEvents()).toEqual([]);
  });
});
