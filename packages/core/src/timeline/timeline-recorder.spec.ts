import { describe, it, expect, beforeEach, vi } from "vitest";
import { createManualClock, type ManualClock } from "@shadowtree/kernel/testing";
import { TimelineEventKind } from "@shadowtree/shared";
import { TimelineRecorder } from "./timeline-recorder.js";
import { NOT_RECORDING, type RecordEventInput } from "./types.js";

const EPOCH = 1_700_000_000_000;

function event(
  componentId: number,
  kind: TimelineEventKind,
  extra: Partial<RecordEventInput> = {},
): RecordEventInput {
  return { componentId, componentName: `C${componentId}`, kind, ...extra };
}

describe("TimelineRecorder", () => {
  let clock: ManualClock;
  let recorder: TimelineRecorder;

  beforeEach(() => {
    clock = createManualClock({ epoch: EPOCH });
    recorder = new TimelineRecorder({ clock });
    recorder.startRecording();
  });

  // ===========================================================================
  // Recording state
  // ===========================================================================

  describe("state", () => {
    it("does nothing while stopped", () => {
      const stopped = new TimelineRecorder({ clock });
      expect(stopped.recordEvent(event(1, TimelineEventKind.Render))).toBe(NOT_RECORDING);
      expect(stopped.recordBatchStart()).toBe(NOT_RECORDING);
      expect(stopped.getEvents()).toEqual([]);
      expect(stopped.getState()).toEqual({
        isRecording: false,
        startedAt: null,
        elapsedMs: 0,
        eventCount: 0,
        batchCount: 0,
        maxEvents: 5000,
      });
    });

    it("reports elapsed time and counts while recording", () => {
      recorder.recordEvent(event(1, TimelineEventKind.Initialize));
      recorder.recordBatchStart();
      clock.advance(250);

      expect(recorder.getState()).toEqual({
        isRecording: true,
        startedAt: EPOCH,
        elapsedMs: 250,
        eventCount: 2,
        batchCount: 1,
        maxEvents: 5000,
      });
    });

    it("stopping freezes the buffer", () => {
      recorder.recordEvent(event(1, TimelineEventKind.Render));
      recorder.stopRecording();

      expect(recorder.recordEvent(event(1, TimelineEventKind.Render))).toBe(NOT_RECORDING);
      expect(recorder.getEvents()).toHaveLength(1);
      expect(recorder.getState()).toMatchObject({ isRecording: false, startedAt: null, eventCount: 1 });
    });

    it("starting again clears events and restarts ids", () => {
      recorder.recordEvent(event(1, TimelineEventKind.Render));
      recorder.recordEvent(event(1, TimelineEventKind.Render));
      recorder.stopRecording();
      recorder.startRecording();

      expect(recorder.getEvents()).toEqual([]);
      expect(recorder.recordEvent(event(1, TimelineEventKind.Render))).toBe(1);
    });

    it("clearing while recording resets the relative clock", () => {
      clock.advance(100);
      recorder.recordEvent(event(1, TimelineEventKind.Render));
      recorder.clearEvents();

      const id = recorder.recordEvent(event(1, TimelineEventKind.Render));
      expect(id).toBe(1);
      expect(recorder.getEvents()[0].relativeMs).toBe(0);
      expect(recorder.getState()).toMatchObject({ isRecording: true, startedAt: EPOCH + 100 });
    });

    it("clearing while stopped empties the buffer and stays stopped", () => {
      recorder.recordEvent(event(1, TimelineEventKind.Render));
      recorder.stopRecording();
      recorder.clearEvents();

      expect(recorder.getState()).toMatchObject({ isRecording: false, eventCount: 0 });
    });
  });

  // ===========================================================================
  // Sequence and capacity
  // ===========================================================================

  describe("sequence and capacity", () => {
    it("assigns strictly increasing, gapless ids", () => {
      const ids = [1, 2, 3, 4].map((n) => recorder.recordEvent(event(n, TimelineEventKind.Render)));
      expect(ids).toEqual([1, 2, 3, 4]);
    });

    it("keeps the most recent events once the cap is reached", () => {
      const small = new TimelineRecorder({ clock, maxEvents: 3 });
      small.startRecording();
      for (const name of ["e0", "e1", "e2", "e3", "e4"]) {
        small.recordEvent({ componentId: 1, componentName: name, kind: TimelineEventKind.Render });
      }

      const events = small.getEvents();
      expect(events.map((e) => e.componentName)).toEqual(["e2", "e3", "e4"]);
      expect(events.map((e) => e.eventId)).toEqual([3, 4, 5]);
    });

    it("clamps the cap to its documented range", () => {
      expect(recorder.setMaxEvents(50)).toBe(100);
      expect(recorder.getState().maxEvents).toBe(100);
      expect(recorder.setMaxEvents(999_999)).toBe(50_000);
      expect(recorder.getState().maxEvents).toBe(50_000);
      expect(recorder.setMaxEvents(2500)).toBe(2500);
    });

    it("evicts overflow immediately when the cap shrinks", () => {
      for (let i = 0; i < 150; i++) {
        recorder.recordEvent(event(1, TimelineEventKind.Render));
      }
      recorder.setMaxEvents(100);

      const events = recorder.getEvents();
      expect(events).toHaveLength(100);
      expect(events[0].eventId).toBe(51);
      expect(events[99].eventId).toBe(150);
    });
  });

  // ===========================================================================
  // Trigger correlation
  // ===========================================================================

  describe("trigger correlation", () => {
    it("attributes a render to the preceding invalidation and consumes it", () => {
      const invalidation = recorder.recordEvent(event(1, TimelineEventKind.Invalidation));
      recorder.recordEvent(event(1, TimelineEventKind.Render));
      recorder.recordEvent(event(1, TimelineEventKind.Render));

      const [, first, second] = recorder.getEvents();
      expect(first).toMatchObject({
        trigger: "invalidation",
        triggeringEventId: invalidation,
        triggerDetails: "State invalidated",
      });
      expect(second).toMatchObject({
        trigger: "parent-rerendered",
        triggeringEventId: null,
        triggerDetails: "Parent re-rendered",
      });
    });

    it("prefers invalidation over callback over parameters-set", () => {
      recorder.recordEvent(event(1, TimelineEventKind.ParametersSet));
      const callback = recorder.recordEvent(
        event(1, TimelineEventKind.CallbackInvoked, { metadata: { callback: "OnClick" } }),
      );
      const invalidation = recorder.recordEvent(event(1, TimelineEventKind.Invalidation));
      const firstRender = recorder.recordEvent(event(1, TimelineEventKind.Render));

      recorder.recordEvent(event(1, TimelineEventKind.ParametersSet));
      recorder.recordEvent(event(1, TimelineEventKind.CallbackInvoked, { metadata: { callback: "OnClick" } }));
      const secondRender = recorder.recordEvent(event(1, TimelineEventKind.Render));

      const parameters = recorder.recordEvent(event(1, TimelineEventKind.ParametersSet));
      const thirdRender = recorder.recordEvent(event(1, TimelineEventKind.Render));

      const byId = new Map(recorder.getEvents().map((e) => [e.eventId, e]));
      expect(callback).toBeGreaterThan(0);
      expect(byId.get(firstRender)).toMatchObject({ trigger: "invalidation", triggeringEventId: invalidation });
      expect(byId.get(secondRender)).toMatchObject({
        trigger: "callback-invoked",
        triggeringEventId: secondRender - 1,
        triggerDetails: "Callback OnClick",
      });
      expect(byId.get(thirdRender)).toMatchObject({
        trigger: "parameter-changed",
        triggeringEventId: parameters,
      });
    });

    it("short-circuits first renders and still consumes the indices", () => {
      recorder.recordEvent(event(1, TimelineEventKind.Invalidation));
      recorder.recordEvent(event(1, TimelineEventKind.Render, { isFirstRender: true }));
      recorder.recordEvent(event(1, TimelineEventKind.Render));

      const [, first, second] = recorder.getEvents();
      expect(first).toMatchObject({ trigger: "first-render", triggeringEventId: null, isFirstRender: true });
      expect(second.trigger).toBe("parent-rerendered");
    });

    it("does not treat suppressed invalidations as triggers", () => {
      recorder.recordEvent(event(1, TimelineEventKind.InvalidationSuppressed, { wasSuppressed: true }));
      recorder.recordEvent(event(1, TimelineEventKind.Render));
      expect(recorder.getEvents()[1].trigger).toBe("parent-rerendered");
    });

    it("keeps indices per component", () => {
      recorder.recordEvent(event(1, TimelineEventKind.Invalidation));
      recorder.recordEvent(event(2, TimelineEventKind.Render));
      const render = recorder.recordEvent(event(1, TimelineEventKind.Render));

      const events = recorder.getEvents();
      expect(events[1].trigger).toBe("parent-rerendered");
      expect(events[2]).toMatchObject({ eventId: render, trigger: "invalidation", triggeringEventId: 1 });
    });

    it("keeps indices per correlation key when components share an id", () => {
      recorder.recordEvent(event(-1, TimelineEventKind.Invalidation, { correlationKey: "a" }));
      recorder.recordEvent(event(-1, TimelineEventKind.Render, { correlationKey: "b" }));
      recorder.recordEvent(event(-1, TimelineEventKind.Render, { correlationKey: "a" }));

      const events = recorder.getEvents();
      expect(events[1]).toMatchObject({ trigger: "parent-rerendered", triggeringEventId: null });
      expect(events[2]).toMatchObject({ trigger: "invalidation", triggeringEventId: 1 });
    });

    it("drops a component's indices when it is disposed", () => {
      recorder.recordEvent(event(3, TimelineEventKind.Invalidation));
      recorder.recordEvent(event(3, TimelineEventKind.Dispose));
      recorder.recordEvent(event(3, TimelineEventKind.Render));

      expect(recorder.getEvents()[2]).toMatchObject({ trigger: "parent-rerendered", triggeringEventId: null });
    });

    it("marks events other than renders as unknown", () => {
      recorder.recordEvent(event(1, TimelineEventKind.Initialize));
      recorder.recordEvent(event(1, TimelineEventKind.Dispose));
      expect(recorder.getEvents().map((e) => e.trigger)).toEqual(["unknown", "unknown"]);
    });
  });

  // ===========================================================================
  // Open durations
  // ===========================================================================

  describe("open durations", () => {
    it("back-fills the duration once", () => {
      clock.advance(10);
      const id = recorder.recordEventStart(event(1, TimelineEventKind.Initialize, { isAsync: true }));
      expect(recorder.getEvents()[0]).toMatchObject({ durationMs: null, endRelativeMs: null });

      expect(recorder.recordEventEnd(id, 12)).toBe(true);
      expect(recorder.recordEventEnd(id, 99)).toBe(false);
      expect(recorder.getEvents()[0]).toMatchObject({
        relativeMs: 10,
        durationMs: 12,
        endRelativeMs: 22,
        isAsync: true,
      });
    });

    it("ignores unknown and evicted ids", () => {
      const small = new TimelineRecorder({ clock, maxEvents: 2 });
      small.startRecording();
      const evicted = small.recordEventStart(event(1, TimelineEventKind.Initialize));
      small.recordEvent(event(1, TimelineEventKind.Render));
      small.recordEvent(event(1, TimelineEventKind.Render));

      expect(small.recordEventEnd(evicted, 5)).toBe(false);
      expect(small.recordEventEnd(42, 5)).toBe(false);
    });
  });

  // ===========================================================================
  // Batches
  // ===========================================================================

  describe("render batches", () => {
    it("parents events to the open batch and collects rendered members", () => {
      const batchId = recorder.recordBatchStart("navigation");
      clock.advance(2);
      recorder.recordEvent(event(4, TimelineEventKind.Render, { durationMs: 1 }));
      recorder.recordEvent(event(5, TimelineEventKind.Render, { durationMs: 1 }));
      recorder.recordEvent(event(4, TimelineEventKind.PostRender));
      clock.advance(3);
      expect(recorder.recordBatchEnd(batchId)).toBe(true);

      expect(recorder.getBatches()).toEqual([
        {
          batchId: 1,
          startRelativeMs: 0,
          endRelativeMs: 5,
          durationMs: 5,
          componentIds: [4, 5],
          componentCount: 2,
          triggerSource: "navigation",
        },
      ]);

      const events = recorder.getEvents();
      expect(events[0]).toMatchObject({
        eventId: 1,
        kind: "batch-started",
        componentId: -1,
        componentName: "[RenderBatch]",
        parentEventId: null,
        batchId: 1,
        metadata: { triggerSource: "navigation" },
      });
      expect(events[1]).toMatchObject({ parentEventId: 1, batchId: 1 });
      expect(events[4]).toMatchObject({
        kind: "batch-completed",
        parentEventId: 1,
        batchId: 1,
        durationMs: 5,
        metadata: { batchId: "1", componentCount: "2" },
      });
    });

    it("uses the membership the host reports when given", () => {
      const batchId = recorder.recordBatchStart();
      recorder.recordEvent(event(4, TimelineEventKind.Render));
      recorder.recordBatchEnd(batchId, [4, 7, 9]);

      expect(recorder.getBatches()[0]).toMatchObject({ componentIds: [4, 7, 9], componentCount: 3 });
    });

    it("events after the batch closes have no parent", () => {
      const batchId = recorder.recordBatchStart();
      recorder.recordBatchEnd(batchId);
      recorder.recordEvent(event(1, TimelineEventKind.Render));

      expect(recorder.getEvents()[2]).toMatchObject({ parentEventId: null, batchId: null });
    });

    it("rejects ending an unknown or already closed batch", () => {
      const batchId = recorder.recordBatchStart();
      expect(recorder.recordBatchEnd(batchId)).toBe(true);
      expect(recorder.recordBatchEnd(batchId)).toBe(false);
      expect(recorder.recordBatchEnd(77)).toBe(false);
    });
  });

  // ===========================================================================
  // Queries
  // ===========================================================================

  describe("queries", () => {
    beforeEach(() => {
      recorder.recordEvent(event(1, TimelineEventKind.Initialize));
      clock.advance(10);
      recorder.recordEvent(event(2, TimelineEventKind.Render));
      clock.advance(10);
      recorder.recordEvent(event(1, TimelineEventKind.Render));
    });

    it("getEventsSince returns only newer ids", () => {
      expect(recorder.getEventsSince(1).map((e) => e.eventId)).toEqual([2, 3]);
      expect(recorder.getEventsSince(3)).toEqual([]);
    });

    it("getEventsInRange is inclusive on both ends", () => {
      expect(recorder.getEventsInRange(10, 20).map((e) => e.eventId)).toEqual([2, 3]);
      expect(recorder.getEventsInRange(0, 9.9).map((e) => e.eventId)).toEqual([1]);
    });

    it("getEventsForComponent filters by id", () => {
      expect(recorder.getEventsForComponent(1).map((e) => e.kind)).toEqual(["initialize", "render"]);
    });

    it("serializes kinds and timestamps at the boundary", () => {
      expect(recorder.getEvents()[1]).toEqual({
        eventId: 2,
        timestamp: EPOCH + 10,
        relativeMs: 10,
        componentId: 2,
        componentName: "C2",
        kind: "render",
        durationMs: null,
        endRelativeMs: null,
        parentEventId: null,
        triggeringEventId: null,
        trigger: "parent-rerendered",
        triggerDetails: "Parent re-rendered",
        isAsync: false,
        isFirstRender: false,
        wasSuppressed: false,
        isEnhanced: true,
        batchId: null,
        sessionId: null,
        metadata: null,
      });
    });
  });

  describe("getRankedComponents", () => {
    it("groups timed renders and orders by total, then id", () => {
      recorder.recordEvent(event(3, TimelineEventKind.Render, { durationMs: 10 }));
      recorder.recordEvent(event(2, TimelineEventKind.Render, { durationMs: 8 }));
      recorder.recordEvent(event(1, TimelineEventKind.Render, { durationMs: 3 }));
      recorder.recordEvent(event(1, TimelineEventKind.Render, { durationMs: 5 }));
      recorder.recordEvent(event(1, TimelineEventKind.Render));
      recorder.recordEvent(event(1, TimelineEventKind.PostRender, { durationMs: 50 }));

      expect(recorder.getRankedComponents()).toEqual([
        {
          componentId: 3,
          componentName: "C3",
          totalRenderMs: 10,
          renderCount: 1,
          averageRenderMs: 10,
          maxRenderMs: 10,
          minRenderMs: 10,
        },
        {
          componentId: 1,
          componentName: "C1",
          totalRenderMs: 8,
          renderCount: 2,
          averageRenderMs: 4,
          maxRenderMs: 5,
          minRenderMs: 3,
        },
        {
          componentId: 2,
          componentName: "C2",
          totalRenderMs: 8,
          renderCount: 1,
          averageRenderMs: 8,
          maxRenderMs: 8,
          minRenderMs: 8,
        },
      ]);
    });

    it("keeps the same id under different names apart", () => {
      recorder.recordEvent({ componentId: 1, componentName: "A", kind: TimelineEventKind.Render, durationMs: 1 });
      recorder.recordEvent({ componentId: 1, componentName: "B", kind: TimelineEventKind.Render, durationMs: 2 });
      expect(recorder.getRankedComponents().map((r) => r.componentName)).toEqual(["B", "A"]);
    });
  });

  // ===========================================================================
  // Subscribers
  // ===========================================================================

  it("stores a copy of the caller's metadata", () => {
    const metadata: Record<string, string> = { location: "/a" };
    recorder.recordEvent(event(1, TimelineEventKind.Navigation, { metadata }));
    metadata.location = "/b";
    metadata.extra = "x";

    expect(recorder.getEvents()[0].metadata).toEqual({ location: "/a" });
  });

  describe("subscribe", () => {
    it("delivers each recorded event until unsubscribed", () => {
      const listener = vi.fn();
      const unsubscribe = recorder.subscribe(listener);
      recorder.recordEvent(event(1, TimelineEventKind.Render));
      unsubscribe();
      recorder.recordEvent(event(1, TimelineEventKind.Render));

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0]).toMatchObject({ eventId: 1, kind: "render" });
    });

    it("keeps recording when a listener throws", () => {
      recorder.subscribe(() => {
        throw new Error("listener broke");
      });
      expect(recorder.recordEvent(event(1, TimelineEventKind.Render))).toBe(1);
      expect(recorder.getEvents()).toHaveLength(1);
    });
  });

  it("records basic-mode renders as not enhanced", () => {
    recorder.recordBasicRender(6, "Legacy", "s1");
    expect(recorder.getEvents()[0]).toMatchObject({
      kind: "basic-render",
      componentId: 6,
      componentName: "Legacy",
      isEnhanced: false,
      sessionId: "s1",
    });
  });
});
