import { describe, expect, it } from "vitest";

import { gutterFragment, type HighlightedLine } from "../../highlight/builder.js";
import { ScrollView } from "../scrollView.js";

function lines(count: number): HighlightedLine[] {
  return Array.from({ length: count }, (_, idx) => [gutterFragment(idx + 1)]);
}

// deterministic sequence of up/down moves
function* moves(seed: number, count: number): Generator<"up" | "down"> {
  let value = seed;
  for (let i = 0; i < count; i += 1) {
    value = (value * 75 + 74) % 65537;
    yield value % 3 === 0 ? "up" : "down";
  }
}

describe("ScrollView", () => {
  it("keeps the cursor inside the cache for any sequence of moves", () => {
    for (let length = 0; length <= 6; length += 1) {
      const view = new ScrollView();
      view.replace(lines(length));
      for (const move of moves(length + 7, 200)) {
        if (move === "up") {
          view.up();
        } else {
          view.down();
        }
        if (length === 0) {
          expect(view.cursor).toBe(0);
        } else {
          expect(view.cursor).toBeGreaterThanOrEqual(0);
          expect(view.cursor).toBeLessThan(length);
        }
      }
    }
  });

  it("stops at the last line and at the first line", () => {
    const view = new ScrollView();
    view.replace(lines(4));
    for (let i = 0; i < 5; i += 1) {
      view.down();
    }
    expect(view.cursor).toBe(3);
    for (let i = 0; i < 5; i += 1) {
      view.up();
    }
    expect(view.cursor).toBe(0);
  });

  it("jumps to the top and bottom", () => {
    const view = new ScrollView();
    view.replace(lines(10));
    view.bottom();
    expect(view.cursor).toBe(9);
    view.top();
    expect(view.cursor).toBe(0);
  });

  it("resets the cursor when the cache is replaced", () => {
    const view = new ScrollView();
    view.replace(lines(5));
    view.down();
    view.down();
    view.replace(lines(2));
    expect(view.cursor).toBe(0);
    expect(view.lines).toHaveLength(2);
  });

  it("scrolls the window so the cursor row is visible", () => {
    const view = new ScrollView();
    view.replace(lines(10));
    expect(view.window(3)).toEqual({ items: lines(3), selected: 0 });

    for (let i = 0; i < 6; i += 1) {
      view.down();
    }
    const window = view.window(3);
    expect(window.selected).toBe(2);
    expect(window.items).toEqual(lines(7).slice(4));
  });

  it("has an empty window without lines or height", () => {
    const view = new ScrollView();
    expect(view.window(5)).toEqual({ items: [], selected: null });
    view.replace(lines(3));
    expect(view.window(0)).toEqual({ items: [], selected: null });
  });
});
