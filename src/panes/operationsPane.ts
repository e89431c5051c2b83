import type { Action } from "../action.js";
import { OK, ok, type Result } from "../errors.js";
import type { HighlightedLine } from "../highlight/builder.js";
import { selectOperation, type NavigationHandle, type NavigationState } from "../state/navigation.js";
import { methodColor, palette } from "../theme.js";
import { printableChar, type KeyEvent, type MouseEvent } from "../tui/events.js";
import { inner, type Rect, type Surface } from "../tui/surface.js";
import type { OperationEntry } from "../types.js";
import { paneBlock, wheelAction, type Pane } from "./pane.js";
import { HIGHLIGHT_SYMBOL } from "./schemaPanel.js";

const IDLE_HINT = "j/k select | / filter | enter open | tab next pane | q quit";
const FILTER_HINT = "type to filter | enter keep | esc clear";

function matches(entry: OperationEntry, needle: string): boolean {
  const haystack = `${entry.method} ${entry.path} ${entry.operation.summary ?? ""}`.toLowerCase();
  return haystack.includes(needle);
}

function operationRow(entry: OperationEntry): HighlightedLine {
  return [
    { text: entry.method.toUpperCase().padEnd(8, " "), style: { fg: methodColor(entry.method), bold: true } },
    { text: entry.path, style: { fg: palette.hint } },
  ];
}

export class OperationsPane implements Pane {
  readonly id = "operations";
  readonly title = "Operations";
  readonly scrollable = true;

  private isFocused: boolean;
  private filter = "";
  private filtering = false;
  // indices into the state's operation list that pass the filter
  private rows: number[] = [];
  private cursor = 0;

  constructor(
    private readonly state: NavigationHandle,
    focused = false,
  ) {
    this.isFocused = focused;
  }

  get focused(): boolean {
    return this.isFocused;
  }

  get hint(): string {
    return this.filtering ? FILTER_HINT : IDLE_HINT;
  }

  get filterText(): string {
    return this.filter;
  }

  get isFiltering(): boolean {
    return this.filtering;
  }

  get selectedRow(): number {
    return this.cursor;
  }

  get rowCount(): number {
    return this.rows.length;
  }

  init(): Result<void> {
    this.sync();
    if (this.rows.length > 0 && this.state.read((s) => s.selected) === null) {
      this.select(0);
    }
    return OK;
  }

  focus(): Result<void> {
    this.isFocused = true;
    return OK;
  }

  unfocus(): Result<void> {
    this.isFocused = false;
    return OK;
  }

  handleKeyEvent(event: KeyEvent): Action | undefined {
    if (!this.filtering) {
      return event.name === "/" && !event.ctrl ? { type: "FilterStart" } : undefined;
    }
    switch (event.name) {
      case "escape":
        return { type: "FilterEnd", keep: false };
      case "enter":
        return { type: "FilterEnd", keep: true };
      case "backspace":
        return { type: "FilterBackspace" };
      default: {
        const ch = printableChar(event);
        return ch === null ? undefined : { type: "FilterInput", text: ch };
      }
    }
  }

  handleMouseEvent(event: MouseEvent): Action | undefined {
    return wheelAction(event);
  }

  private visibleRows(state: NavigationState): number[] {
    const needle = this.filter.trim().toLowerCase();
    const rows: number[] = [];
    state.operations.forEach((entry, idx) => {
      if (!needle || matches(entry, needle)) {
        rows.push(idx);
      }
    });
    return rows;
  }

  private sync(): void {
    const { rows, selected } = this.state.read((s) => ({ rows: this.visibleRows(s), selected: s.selected }));
    this.rows = rows;
    const idx = selected === null ? -1 : rows.indexOf(selected);
    this.cursor = idx >= 0 ? idx : 0;
  }

  private select(row: number): void {
    const target = this.rows.length === 0 ? null : this.rows[row];
    this.cursor = this.rows.length === 0 ? 0 : row;
    this.state.write((s) => selectOperation(s, target));
  }

  private applyFilter(): Action {
    this.rows = this.state.read((s) => this.visibleRows(s));
    this.select(0);
    return { type: "Update" };
  }

  private move(row: number): Result<Action | undefined> {
    if (this.rows.length === 0) {
      return ok(undefined);
    }
    const next = Math.max(0, Math.min(row, this.rows.length - 1));
    if (next === this.cursor && this.state.read((s) => s.selected) === this.rows[next]) {
      return ok(undefined);
    }
    this.select(next);
    return ok({ type: "Update" });
  }

  update(action: Action): Result<Action | undefined> {
    switch (action.type) {
      case "Update":
        this.sync();
        return ok(undefined);
      case "Down":
        return this.move(this.cursor + 1);
      case "Up":
        return this.move(this.cursor - 1);
      case "Top":
        return this.move(0);
      case "Bottom":
        return this.move(this.rows.length - 1);
      case "Submit":
        return ok({ type: "FocusNext" });
      case "FilterStart":
        this.filtering = true;
        return ok(undefined);
      case "FilterInput":
        this.filter += action.text;
        return ok(this.applyFilter());
      case "FilterBackspace":
        if (this.filter.length === 0) {
          return ok(undefined);
        }
        this.filter = this.filter.slice(0, -1);
        return ok(this.applyFilter());
      case "FilterEnd":
        this.filtering = false;
        if (action.keep || this.filter.length === 0) {
          return ok(undefined);
        }
        this.filter = "";
        return ok(this.applyFilter());
      default:
        return ok(undefined);
    }
  }

  draw(surface: Surface, area: Rect): Result<void> {
    const block = surface.render(paneBlock(this.title, this.isFocused), area);
    if (!block.ok) {
      return block;
    }

    let content = inner(area);
    if (content.height === 0) {
      return OK;
    }
    if (this.filtering || this.filter.length > 0) {
      const filterLine: HighlightedLine = [
        { text: "/", style: { fg: palette.section } },
        { text: this.filter, style: { fg: this.filtering ? palette.warn : palette.hint } },
      ];
      const drawn = surface.render({ kind: "paragraph", lines: [filterLine] }, { ...content, height: 1 });
      if (!drawn.ok) {
        return drawn;
      }
      content = { ...content, y: content.y + 1, height: content.height - 1 };
      if (content.height === 0) {
        return OK;
      }
    }

    const operations = this.state.read((s) => s.operations);
    if (this.rows.length === 0) {
      const empty: HighlightedLine = [{ text: "No matching operations.", style: { fg: palette.warn } }];
      return surface.render({ kind: "paragraph", lines: [empty] }, content);
    }

    const start = Math.max(0, this.cursor - content.height + 1);
    const items = this.rows.slice(start, start + content.height).map((idx) => operationRow(operations[idx]));
    return surface.render(
      { kind: "list", items, selected: this.cursor - start, highlightSymbol: HIGHLIGHT_SYMBOL },
      content,
    );
  }
}
