import type { HighlightedLine } from "../highlight/builder.js";

export type ScrollWindow = {
  items: HighlightedLine[];
  selected: number | null;
};

export class ScrollView {
  private cache: HighlightedLine[] = [];
  private offset = 0;

  get lines(): readonly HighlightedLine[] {
    return this.cache;
  }

  get cursor(): number {
    return this.offset;
  }

  replace(lines: HighlightedLine[]): void {
    this.cache = lines;
    this.offset = 0;
  }

  down(): void {
    this.offset = Math.min(this.offset + 1, Math.max(this.cache.length - 1, 0));
  }

  up(): void {
    this.offset = Math.max(this.offset - 1, 0);
  }

  top(): void {
    this.offset = 0;
  }

  bottom(): void {
    this.offset = Math.max(this.cache.length - 1, 0);
  }

  window(height: number): ScrollWindow {
    if (this.cache.length === 0 || height <= 0) {
      return { items: [], selected: null };
    }
    const start = Math.max(0, this.offset - height + 1);
    return {
      items: this.cache.slice(start, start + height),
      selected: this.offset - start,
    };
  }
}
