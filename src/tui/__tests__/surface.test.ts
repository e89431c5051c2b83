import { describe, expect, it } from "vitest";

import { contains, Frame, inner } from "../surface.js";

describe("inner", () => {
  it("shrinks by the margins and never below zero", () => {
    expect(inner({ x: 2, y: 3, width: 10, height: 5 })).toEqual({ x: 3, y: 4, width: 8, height: 3 });
    expect(inner({ x: 0, y: 0, width: 10, height: 5 }, 2, 0)).toEqual({ x: 2, y: 0, width: 6, height: 5 });
    expect(inner({ x: 0, y: 0, width: 1, height: 1 })).toEqual({ x: 1, y: 1, width: 0, height: 0 });
  });
});

describe("Frame", () => {
  const bounds = { x: 0, y: 0, width: 20, height: 10 };

  it("accepts areas inside its bounds, edges included", () => {
    expect(contains(bounds, bounds)).toBe(true);
    expect(contains(bounds, { x: 19, y: 9, width: 1, height: 1 })).toBe(true);
    expect(contains(bounds, { x: 19, y: 9, width: 2, height: 1 })).toBe(false);
    expect(contains(bounds, { x: -1, y: 0, width: 1, height: 1 })).toBe(false);
  });

  it("records widgets in draw order", () => {
    const frame = new Frame(bounds);
    frame.render({ kind: "paragraph", lines: [] }, { x: 0, y: 0, width: 5, height: 1 });
    frame.render({ kind: "tabs", titles: [], selected: null }, { x: 0, y: 1, width: 5, height: 1 });
    expect(frame.widgets.map((placed) => placed.widget.kind)).toEqual(["paragraph", "tabs"]);
  });

  it("rejects an area that leaves the bounds", () => {
    const frame = new Frame(bounds);
    expect(frame.render({ kind: "paragraph", lines: [] }, { x: 15, y: 0, width: 6, height: 2 })).toEqual({
      ok: false,
      error: { kind: "RenderError", message: "paragraph area 6x2+15+0 lies outside 20x10" },
    });
    expect(frame.widgets).toEqual([]);
  });
});
