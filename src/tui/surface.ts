import { fail, OK, type Result } from "../errors.js";
import type { HighlightedLine } from "../highlight/builder.js";
import type { TextStyle } from "../theme.js";

export type Rect = { x: number; y: number; width: number; height: number };

export type TabTitle = { text: string; style: TextStyle };

export type Widget =
  | { kind: "block"; title: string; borderType: "thick" | "plain"; borderStyle: TextStyle }
  | { kind: "tabs"; titles: TabTitle[]; selected: number | null }
  | { kind: "list"; items: HighlightedLine[]; selected: number | null; highlightSymbol: string }
  | { kind: "paragraph"; lines: HighlightedLine[] };

export type PlacedWidget = { widget: Widget; area: Rect };

export interface Surface {
  readonly bounds: Rect;
  render(widget: Widget, area: Rect): Result<void>;
}

export function inner(area: Rect, horizontal = 1, vertical = 1): Rect {
  return {
    x: area.x + horizontal,
    y: area.y + vertical,
    width: Math.max(0, area.width - horizontal * 2),
    height: Math.max(0, area.height - vertical * 2),
  };
}

export function contains(outer: Rect, area: Rect): boolean {
  return (
    area.width >= 0 &&
    area.height >= 0 &&
    area.x >= outer.x &&
    area.y >= outer.y &&
    area.x + area.width <= outer.x + outer.width &&
    area.y + area.height <= outer.y + outer.height
  );
}

export class Frame implements Surface {
  readonly widgets: PlacedWidget[] = [];

  constructor(readonly bounds: Rect) {}

  render(widget: Widget, area: Rect): Result<void> {
    if (!contains(this.bounds, area)) {
      return fail(
        "RenderError",
        `${widget.kind} area ${area.width}x${area.height}+${area.x}+${area.y} lies outside ${this.bounds.width}x${this.bounds.height}`,
      );
    }
    this.widgets.push({ widget, area });
    return OK;
  }
}
