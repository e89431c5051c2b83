import { describe, expect, it } from "vitest";

import { computeLayout } from "../layout.js";

describe("computeLayout", () => {
  it("splits the body and reserves the bottom row", () => {
    expect(computeLayout({ width: 100, height: 30 }, 0.35)).toEqual({
      panes: {
        operations: { x: 0, y: 0, width: 35, height: 29 },
        request: { x: 35, y: 0, width: 65, height: 14 },
        response: { x: 35, y: 14, width: 65, height: 15 },
      },
      status: { x: 0, y: 29, width: 100, height: 1 },
    });
  });

  it("collapses to empty areas on a zero-sized screen", () => {
    const layout = computeLayout({ width: 0, height: 0 }, 0.5);
    expect(layout.status).toEqual({ x: 0, y: 0, width: 0, height: 0 });
    expect(layout.panes.response).toEqual({ x: 0, y: 0, width: 0, height: 0 });
  });
});
