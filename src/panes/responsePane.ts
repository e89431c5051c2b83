import type { Action } from "../action.js";
import { OK, ok, type Result } from "../errors.js";
import { buildHighlightedLines } from "../highlight/builder.js";
import { responseStatuses } from "../spec/content.js";
import { activeOperation, type NavigationHandle } from "../state/navigation.js";
import { statusColor } from "../theme.js";
import type { KeyEvent, MouseEvent } from "../tui/events.js";
import type { Rect, Surface } from "../tui/surface.js";
import { wheelAction, type Pane } from "./pane.js";
import { applyScroll, cycle, drawSchemaPanel } from "./schemaPanel.js";
import { ScrollView } from "./scrollView.js";

export type ResponsePaneOptions = {
  mediaType: string;
  focused?: boolean;
};

export class ResponsePane implements Pane {
  readonly id = "response";
  readonly title = "Response";
  readonly scrollable = true;
  readonly hint = "j/k scroll | g/G top/bottom | h/l status | tab next pane | q quit";

  private isFocused: boolean;
  private statuses: string[] = [];
  private status: string | null = null;
  private readonly view = new ScrollView();

  constructor(
    private readonly state: NavigationHandle,
    private readonly options: ResponsePaneOptions,
  ) {
    this.isFocused = options.focused ?? false;
  }

  get focused(): boolean {
    return this.isFocused;
  }

  get cache(): ScrollView {
    return this.view;
  }

  get activeStatus(): string | null {
    return this.status;
  }

  init(): Result<void> {
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

  handleKeyEvent(_event: KeyEvent): Action | undefined {
    return undefined;
  }

  handleMouseEvent(event: MouseEvent): Action | undefined {
    return wheelAction(event);
  }

  private rebuild(pickStatus: (statuses: string[]) => string | null): Result<void> {
    const { document, entry } = this.state.read((s) => ({ document: s.document, entry: activeOperation(s) }));
    const operation = entry?.operation ?? null;
    const statuses = operation ? responseStatuses(operation) : [];
    const status = pickStatus(statuses);

    const lines =
      operation && status !== null
        ? buildHighlightedLines(document, operation, { kind: "response", status, mediaType: this.options.mediaType })
        : ok([]);
    if (!lines.ok) {
      return lines;
    }

    this.statuses = statuses;
    this.status = status;
    this.view.replace(lines.value);
    return OK;
  }

  update(action: Action): Result<Action | undefined> {
    if (applyScroll(this.view, action)) {
      return ok(undefined);
    }

    switch (action.type) {
      case "Update": {
        const rebuilt = this.rebuild((statuses) => statuses[0] ?? null);
        return rebuilt.ok ? ok(undefined) : rebuilt;
      }
      case "NextTab":
      case "PrevTab": {
        const delta = action.type === "NextTab" ? 1 : -1;
        const next = cycle(this.statuses, this.status, delta);
        if (next === null || next === this.status) {
          return ok(undefined);
        }
        const rebuilt = this.rebuild(() => next);
        return rebuilt.ok ? ok(undefined) : rebuilt;
      }
      default:
        return ok(undefined);
    }
  }

  draw(surface: Surface, area: Rect): Result<void> {
    const status = this.status;
    return drawSchemaPanel(surface, area, {
      title: this.title,
      focused: this.isFocused,
      tabs: this.statuses.length > 0 ? this.statuses.map((text) => ({ text, style: { fg: statusColor(text) } })) : null,
      selectedTab: status === null ? null : this.statuses.indexOf(status),
      view: this.view,
    });
  }
}
