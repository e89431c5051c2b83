import { isBroadcast, type Action } from "../action.js";
import { formatError, OK, ok, type Result } from "../errors.js";
import type { Pane, PaneId } from "../panes/pane.js";
import type { Logger } from "../services/logger.js";
import { activeOperation, operationLabel, type NavigationHandle } from "../state/navigation.js";
import type { TerminalEvent } from "../tui/events.js";
import { Frame, type PlacedWidget, type Rect } from "../tui/surface.js";
import { mapEvent } from "./keymap.js";
import { computeLayout, type ScreenSize } from "./layout.js";

export type PaneSnapshot = {
  id: PaneId;
  area: Rect;
  widgets: PlacedWidget[];
};

export type StatusLine = {
  area: Rect;
  document: string;
  operation: string | null;
  hint: string;
};

export type FrameSnapshot = {
  width: number;
  height: number;
  panes: PaneSnapshot[];
  status: StatusLine;
};

export interface Screen {
  present(frame: FrameSnapshot): void;
}

export type ControllerOptions = {
  state: NavigationHandle;
  size: ScreenSize;
  splitRatio: number;
  logger: Logger;
};

export class AppController {
  private focusIndex = 0;
  private size: ScreenSize;
  private quitting = false;

  constructor(
    private readonly panes: readonly Pane[],
    private readonly options: ControllerOptions,
  ) {
    if (panes.length === 0) {
      throw new Error("at least one pane is required");
    }
    this.size = options.size;
  }

  get focusedPane(): Pane {
    return this.panes[this.focusIndex];
  }

  get shouldQuit(): boolean {
    return this.quitting;
  }

  init(): Result<void> {
    for (const pane of this.panes) {
      const initialized = pane.init();
      if (!initialized.ok) {
        return initialized;
      }
    }

    const initialFocus = this.panes.findIndex((pane) => pane.focused);
    this.focusIndex = initialFocus >= 0 ? initialFocus : 0;
    for (const [idx, pane] of this.panes.entries()) {
      const changed = idx === this.focusIndex ? pane.focus() : pane.unfocus();
      if (!changed.ok) {
        return changed;
      }
    }

    return this.dispatch({ type: "Update" });
  }

  private moveFocus(delta: number): Result<void> {
    const next = (this.focusIndex + delta + this.panes.length) % this.panes.length;
    if (next === this.focusIndex) {
      return OK;
    }
    const left = this.focusedPane.unfocus();
    if (!left.ok) {
      return left;
    }
    this.focusIndex = next;
    this.options.logger.debug(`focus -> ${this.focusedPane.id}`);
    return this.focusedPane.focus();
  }

  dispatch(action: Action): Result<void> {
    const queue: Action[] = [action];

    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      switch (next.type) {
        case "Quit":
          this.quitting = true;
          continue;
        case "FocusNext":
        case "FocusPrev": {
          const moved = this.moveFocus(next.type === "FocusNext" ? 1 : -1);
          if (!moved.ok) {
            return moved;
          }
          continue;
        }
        case "Resize":
          this.size = { width: next.width, height: next.height };
          break;
        default:
          break;
      }

      const targets = isBroadcast(next) ? this.panes : [this.focusedPane];
      for (const pane of targets) {
        const updated = pane.update(next);
        if (!updated.ok) {
          return updated;
        }
        if (updated.value !== undefined) {
          queue.push(updated.value);
        }
      }
    }

    return OK;
  }

  handleEvent(event: TerminalEvent): Result<void> {
    const action = mapEvent(event, this.focusedPane);
    return action === undefined ? OK : this.dispatch(action);
  }

  draw(): Result<FrameSnapshot> {
    const layout = computeLayout(this.size, this.options.splitRatio);
    const bounds: Rect = { x: 0, y: 0, width: this.size.width, height: this.size.height };

    const panes: PaneSnapshot[] = [];
    for (const pane of this.panes) {
      const area = layout.panes[pane.id];
      const frame = new Frame(bounds);
      const drawn = pane.draw(frame, area);
      if (!drawn.ok) {
        return drawn;
      }
      panes.push({ id: pane.id, area, widgets: frame.widgets });
    }

    const { document, operation } = this.options.state.read((s) => {
      const entry = activeOperation(s);
      return {
        document: `${s.document.info.title} ${s.document.info.version}`,
        operation: entry ? operationLabel(entry) : null,
      };
    });

    return ok({
      width: this.size.width,
      height: this.size.height,
      panes,
      status: { area: layout.status, document, operation, hint: this.focusedPane.hint },
    });
  }

  private present(screen: Screen): Result<void> {
    const frame = this.draw();
    if (!frame.ok) {
      return frame;
    }
    screen.present(frame.value);
    return OK;
  }

  async run(events: AsyncIterable<TerminalEvent>, screen: Screen): Promise<Result<void>> {
    const started = this.init();
    const first = started.ok ? this.present(screen) : started;
    if (!first.ok) {
      this.options.logger.error(formatError(first.error));
      return first;
    }

    for await (const event of events) {
      const handled = this.handleEvent(event);
      const step = handled.ok && !this.quitting ? this.present(screen) : handled;
      if (!step.ok) {
        this.options.logger.error(formatError(step.error));
        return step;
      }
      if (this.quitting) {
        break;
      }
    }

    return OK;
  }
}
