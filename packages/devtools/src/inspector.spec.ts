import { describe, it, expect, beforeEach } from "vitest";
import { createShadowtree, type Shadowtree } from "@shadowtree/core";
import { createManualClock } from "@shadowtree/kernel/testing";
import { SessionNotFoundError } from "@shadowtree/shared";
import { Inspector } from "./inspector.js";

describe("Inspector", () => {
  let engine: Shadowtree;
  let inspector: Inspector;

  beforeEach(() => {
    engine = createShadowtree({ env: {}, clock: createManualClock(), configureLogging: false });
    inspector = new Inspector(engine);
  });

  it("controls recording and reports state", () => {
    expect(inspector.startRecording().isRecording).toBe(true);
    engine.instrument("s1");
    expect(inspector.getState().eventCount).toBe(1);

    expect(inspector.clearEvents()).toMatchObject({ isRecording: true, eventCount: 0 });
    expect(inspector.stopRecording().isRecording).toBe(false);
  });

  it("clamps the event capacity", () => {
    expect(inspector.setMaxEvents(10)).toBe(100);
    expect(inspector.getState().maxEvents).toBe(100);
  });

  it("answers component queries per session", () => {
    const hooks = engine.instrument("s1");
    const component = {};
    hooks.onCreate(component, { name: "Counter", fullName: "App.Counter" });
    hooks.onAttach(component, 7);

    expect(inspector.getSessionIds()).toEqual(["s1"]);
    expect(inspector.getComponent("s1", 7)).toMatchObject({ componentId: 7, typeName: "Counter" });
    expect(inspector.getComponent("s1", 8)).toBeNull();
    expect(inspector.getCounts("s1")).toEqual({ resolved: 1, pending: 0, total: 1, enhanced: 1, basic: 0 });
    expect(inspector.getAllComponents("s1")).toHaveLength(1);
    expect(inspector.getSubtree("s1", 7)).toMatchObject({ component: { componentId: 7 }, children: [] });
  });

  it("throws for unknown sessions", () => {
    expect(() => inspector.getCounts("missing")).toThrow(SessionNotFoundError);
  });

  it("forwards timeline queries", () => {
    inspector.startRecording();
    const hooks = engine.instrument("s1");
    const component = {};
    hooks.onCreate(component, { name: "Counter", fullName: "App.Counter" });
    hooks.onAttach(component, 7);
    hooks.onRender(component, 4);

    expect(inspector.getEvents().map((e) => e.kind)).toEqual(["session-opened", "render"]);
    expect(inspector.getEventsSince(1).map((e) => e.eventId)).toEqual([2]);
    expect(inspector.getEventsForComponent(7)).toHaveLength(1);
    expect(inspector.getEventsInRange(0, 0)).toHaveLength(2);
    expect(inspector.getBatches()).toEqual([]);
    expect(inspector.getRankedComponents()).toMatchObject([{ componentId: 7, totalRenderMs: 4 }]);
  });
});
