import { describe, it, expect } from "vitest";
import {
  RenderTrigger,
  TimelineEventKind,
  parseEventKind,
  serializeEventKind,
  serializeRenderTrigger,
} from "./timeline.js";

describe("timeline vocabulary", () => {
  it("serializes event kinds to kebab-case names", () => {
    expect(serializeEventKind(TimelineEventKind.ParametersSet)).toBe("parameters-set");
    expect(serializeEventKind(TimelineEventKind.InvalidationSuppressed)).toBe("invalidation-suppressed");
    expect(serializeEventKind(TimelineEventKind.BasicRender)).toBe("basic-render");
  });

  it("parses every name it serializes", () => {
    for (const kind of Object.values(TimelineEventKind)) {
      expect(parseEventKind(serializeEventKind(kind))).toBe(kind);
    }
  });

  it("rejects names outside the vocabulary", () => {
    expect(parseEventKind("Render")).toBeUndefined();
    expect(parseEventKind("")).toBeUndefined();
  });

  it("serializes render triggers", () => {
    expect(serializeRenderTrigger(RenderTrigger.FirstRender)).toBe("first-render");
    expect(serializeRenderTrigger(RenderTrigger.ParentRerendered)).toBe("parent-rerendered");
  });
});
