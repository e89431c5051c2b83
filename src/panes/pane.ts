import type { Action } from "../action.js";
import type { Result } from "../errors.js";
import { borderColor } from "../theme.js";
import type { KeyEvent, MouseEvent } from "../tui/events.js";
import type { Rect, Surface, Widget } from "../tui/surface.js";

export type PaneId = "operations" | "request" | "response";

export interface Pane {
  readonly id: PaneId;
  readonly title: string;
  readonly scrollable: boolean;
  readonly focused: boolean;
  readonly hint: string;

  init(): Result<void>;
  focus(): Result<void>;
  unfocus(): Result<void>;
  handleKeyEvent(event: KeyEvent): Action | undefined;
  handleMouseEvent(event: MouseEvent): Action | undefined;
  update(action: Action): Result<Action | undefined>;
  draw(surface: Surface, area: Rect): Result<void>;
}

export function paneBlock(title: string, focused: boolean): Widget {
  return {
    kind: "block",
    title,
    borderType: focused ? "thick" : "plain",
    borderStyle: focused ? { fg: borderColor(true), bold: true } : { fg: borderColor(false) },
  };
}

export function wheelAction(event: MouseEvent): Action | undefined {
  switch (event.kind) {
    case "scrollUp":
      return { type: "Up" };
    case "scrollDown":
      return { type: "Down" };
    default:
      return undefined;
  }
}
