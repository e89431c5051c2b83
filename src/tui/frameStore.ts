import type { FrameSnapshot, Screen } from "../app/controller.js";

type Listener = () => void;

export class FrameStore implements Screen {
  private frame: FrameSnapshot | null = null;
  private readonly listeners = new Set<Listener>();

  present(frame: FrameSnapshot): void {
    this.frame = frame;
    for (const listener of this.listeners) {
      listener();
    }
  }

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  getSnapshot = (): FrameSnapshot | null => this.frame;
}
