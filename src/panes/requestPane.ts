import type { Action } from "../action.js";
import { OK, ok, type Result } from "../errors.js";
import { buildHighlightedLines } from "../highlight/builder.js";
import { requestBodyContent } from "../spec/content.js";
import { activeOperation, type NavigationHandle } from "../state/navigation.js";
import { palette } from "../theme.js";
import type { KeyEvent, MouseEvent } from "../tui/events.js";
import type { Rect, Surface } from "../tui/surface.js";
import { wheelAction, type Pane } from "./pane.js";
import { applyScroll, cycle, drawSchemaPanel } from "./schemaPanel.js";
import { ScrollView } from "./scrollView.js";

export type RequestPaneOptions = {
  mediaType: string;
  focused?: boolean;
};

export class RequestPane implements Pane {
  readonly id = "request";
  readonly title = "Request";
  readonly scrollable = true;
  readonly hint = "j/k scroll | g/G top/bottom | h/l media type | tab next pane | q quit";

  private isFocused: boolean;
  private mediaTypes: string[] | null = null;
  private mediaType: string;
  private readonly view = new ScrollView();

  constructor(
    private readonly state: NavigationHandle,
    private readonly options: RequestPaneOptions,
  ) {
    this.isFocused = options.focused ?? false;
    this.mediaType = options.mediaType;
  }

  get focused(): boolean {
    return this.isFocused;
  }

  get cache(): ScrollView {
    return this.view;
  }

  get activeMediaType(): string {
    return this.mediaType;
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

  // Nothing is assigned until every step succeeded, so a failed rebuild keeps the previous view.
  private rebuild(mediaType: string): Result<void> {
    const { document, entry } = this.state.read((s) => ({ document: s.document, entry: activeOperation(s) }));
    const operation = entry?.operation ?? null;

    const content = operation ? requestBodyContent(document, operation) : ok(null);
    if (!content.ok) {
      return content;
    }
    const lines = buildHighlightedLines(document, operation, { kind: "request", mediaType });
    if (!lines.ok) {
      return lines;
    }

    this.mediaTypes = content.value ? Object.keys(content.value) : null;
    this.mediaType = mediaType;
    this.view.replace(lines.value);
    return OK;
  }

  update(action: Action): Result<Action | undefined> {
    if (applyScroll(this.view, action)) {
      return ok(undefined);
    }

    switch (action.type) {
      case "Update": {
        const rebuilt = this.rebuild(this.options.mediaType);
        return rebuilt.ok ? ok(undefined) : rebuilt;
      }
      case "NextTab":
      case "PrevTab": {
        const next = cycle(this.mediaTypes ?? [], this.mediaType, action.type === "NextTab" ? 1 : -1);
        if (next === null || next === this.mediaType) {
          return ok(undefined);
        }
        const rebuilt = this.rebuild(next);
        return rebuilt.ok ? ok(undefined) : rebuilt;
      }
      default:
        return ok(undefined);
    }
  }

  draw(surface: Surface, area: Rect): Result<void> {
    const tabs = this.mediaTypes;
    return drawSchemaPanel(surface, area, {
      title: this.title,
      focused: this.isFocused,
      tabs: tabs ? tabs.map((text) => ({ text, style: { fg: palette.hint } })) : null,
      selectedTab: tabs && tabs.includes(this.mediaType) ? tabs.indexOf(this.mediaType) : null,
      view: this.view,
    });
  }
}
