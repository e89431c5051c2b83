import type { PaneId } from "../panes/pane.js";
import type { Rect } from "../tui/surface.js";

export type ScreenSize = { width: number; height: number };

export type Layout = {
  panes: Record<PaneId, Rect>;
  status: Rect;
};

export function computeLayout(size: ScreenSize, splitRatio: number): Layout {
  const width = Math.max(0, size.width);
  const height = Math.max(0, size.height);
  const bodyHeight = Math.max(0, height - 1);
  const leftWidth = Math.floor(width * splitRatio);
  const rightWidth = width - leftWidth;
  const requestHeight = Math.floor(bodyHeight / 2);

  return {
    panes: {
      operations: { x: 0, y: 0, width: leftWidth, height: bodyHeight },
      request: { x: leftWidth, y: 0, width: rightWidth, height: requestHeight },
      response: { x: leftWidth, y: requestHeight, width: rightWidth, height: bodyHeight - requestHeight },
    },
    status: { x: 0, y: bodyHeight, width, height: Math.min(1, height) },
  };
}
