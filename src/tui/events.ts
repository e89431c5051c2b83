export type KeyEvent = {
  name: string;
  sequence: string;
  ctrl: boolean;
  meta: boolean;
  shift: boolean;
};

export type MouseEvent = {
  kind: "scrollUp" | "scrollDown" | "press";
  x: number;
  y: number;
};

export type TerminalEvent =
  | { kind: "key"; key: KeyEvent }
  | { kind: "mouse"; mouse: MouseEvent }
  | { kind: "resize"; width: number; height: number }
  | { kind: "tick" };

export type InputKey = {
  upArrow?: boolean;
  downArrow?: boolean;
  leftArrow?: boolean;
  rightArrow?: boolean;
  pageUp?: boolean;
  pageDown?: boolean;
  return?: boolean;
  escape?: boolean;
  tab?: boolean;
  backspace?: boolean;
  delete?: boolean;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
};

function keyName(input: string, key: InputKey): string {
  if (key.upArrow) return "up";
  if (key.downArrow) return "down";
  if (key.leftArrow) return "left";
  if (key.rightArrow) return "right";
  if (key.pageUp) return "pageup";
  if (key.pageDown) return "pagedown";
  if (key.return) return "enter";
  if (key.escape) return "escape";
  if (key.tab) return "tab";
  // terminals send DEL (0x7f) for backspace, which Ink reports as delete
  if (key.backspace || key.delete) return "backspace";
  return input;
}

export function toKeyEvent(input: string, key: InputKey): KeyEvent {
  return {
    name: keyName(input, key),
    sequence: input,
    ctrl: key.ctrl ?? false,
    meta: key.meta ?? false,
    shift: key.shift ?? false,
  };
}

export function printableChar(key: KeyEvent): string | null {
  if (key.ctrl || key.meta || key.sequence.length !== 1 || key.name !== key.sequence) {
    return null;
  }
  const code = key.sequence.charCodeAt(0);
  if (code < 32 || code === 127) {
    return null;
  }
  return key.sequence;
}

export class EventQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiting: ((result: IteratorResult<T>) => void) | null = null;
  private closed = false;

  push(item: T): void {
    if (this.closed) {
      return;
    }
    const waiter = this.waiting;
    if (waiter) {
      this.waiting = null;
      waiter({ value: item, done: false });
      return;
    }
    this.items.push(item);
  }

  close(): void {
    this.closed = true;
    const waiter = this.waiting;
    if (waiter) {
      this.waiting = null;
      waiter({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: (): Promise<IteratorResult<T>> => {
        if (this.items.length > 0) {
          const item = this.items[0];
          this.items = this.items.slice(1);
          return Promise.resolve({ value: item, done: false });
        }
        if (this.closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
          this.waiting = resolve;
        });
      },
    };
  }
}
