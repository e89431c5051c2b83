import type { Action } from "../action.js";
import { OK, type Result } from "../errors.js";
import type { Rect, Surface, TabTitle } from "../tui/surface.js";
import { inner } from "../tui/surface.js";
import { paneBlock } from "./pane.js";
import type { ScrollView } from "./scrollView.js";

export const HIGHLIGHT_SYMBOL = "▶ ";

export type SchemaPanel = {
  title: string;
  focused: boolean;
  // null when the operation has nothing of this kind to show
  tabs: TabTitle[] | null;
  selectedTab: number | null;
  view: ScrollView;
};

export function applyScroll(view: ScrollView, action: Action): boolean {
  switch (action.type) {
    case "Down":
      view.down();
      return true;
    case "Up":
      view.up();
      return true;
    case "Top":
      view.top();
      return true;
    case "Bottom":
      view.bottom();
      return true;
    default:
      return false;
  }
}

export function cycle(items: readonly string[], current: string | null, delta: number): string | null {
  if (items.length === 0) {
    return null;
  }
  const idx = current === null ? -1 : items.indexOf(current);
  if (idx < 0) {
    return delta >= 0 ? items[0] : items[items.length - 1];
  }
  return items[(idx + delta + items.length) % items.length];
}

export function drawSchemaPanel(surface: Surface, area: Rect, panel: SchemaPanel): Result<void> {
  const block = surface.render(paneBlock(panel.title, panel.focused), area);
  if (!block.ok) {
    return block;
  }
  if (panel.tabs === null) {
    return OK;
  }

  const content = inner(area);
  if (content.height === 0) {
    return OK;
  }
  const tabs = surface.render(
    { kind: "tabs", titles: panel.tabs, selected: panel.selectedTab },
    { ...content, height: 1 },
  );
  if (!tabs.ok) {
    return tabs;
  }

  const listArea = inner(content);
  listArea.height = Math.max(0, content.height - 1);
  if (listArea.height === 0) {
    return OK;
  }
  const window = panel.view.window(listArea.height);
  return surface.render(
    { kind: "list", items: window.items, selected: window.selected, highlightSymbol: HIGHLIGHT_SYMBOL },
    listArea,
  );
}
