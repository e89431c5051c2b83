import type { Action } from "../action.js";
import type { Pane } from "../panes/pane.js";
import type { KeyEvent, TerminalEvent } from "../tui/events.js";

function scrollAction(key: KeyEvent): Action | undefined {
  switch (key.name) {
    case "up":
    case "k":
      return { type: "Up" };
    case "down":
    case "j":
      return { type: "Down" };
    case "g":
    case "pageup":
      return { type: "Top" };
    case "G":
    case "pagedown":
      return { type: "Bottom" };
    default:
      return undefined;
  }
}

function globalKeyAction(key: KeyEvent, pane: Pane): Action | undefined {
  if (key.ctrl) {
    return key.name === "c" ? { type: "Quit" } : undefined;
  }

  switch (key.name) {
    case "q":
      return { type: "Quit" };
    case "tab":
      return key.shift ? { type: "FocusPrev" } : { type: "FocusNext" };
    case "enter":
      return { type: "Submit" };
    case "left":
    case "h":
    case "[":
      return { type: "PrevTab" };
    case "right":
    case "l":
    case "]":
      return { type: "NextTab" };
    default:
      return pane.scrollable ? scrollAction(key) : undefined;
  }
}

export function mapEvent(event: TerminalEvent, focused: Pane): Action | undefined {
  switch (event.kind) {
    case "key":
      return focused.handleKeyEvent(event.key) ?? globalKeyAction(event.key, focused);
    case "mouse":
      return focused.handleMouseEvent(event.mouse);
    case "resize":
      return { type: "Resize", width: event.width, height: event.height };
    case "tick":
      return { type: "Tick" };
  }
}
