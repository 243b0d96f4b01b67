/**
 * Vertical and horizontal scroll state over the flattened document.
 *
 * The total line count is read through a callback so the viewport always
 * clamps against the current document, including one that is still growing.
 * Invariant after every call: `0 <= top <= max(0, total - height)`.
 *
 * @module viewport/Viewport
 */

export type Alignment = 'top' | 'center' | 'bottom';

export interface ViewportOptions {
  height: number;
  width: number;
  /** Rows kept between the cursor and either edge while scrolling. */
  scrolloff?: number;
}

export interface CursorBounds {
  min: number;
  max: number;
}

export class Viewport {
  private _top = 0;
  private _left = 0;
  private _height: number;
  private _width: number;
  private readonly _scrolloff: number;

  constructor(
    private readonly totalLines: () => number,
    options: ViewportOptions,
  ) {
    this._height = Math.max(0, options.height);
    this._width = Math.max(0, options.width);
    this._scrolloff = Math.max(0, options.scrolloff ?? 0);
  }

  get top(): number {
    return this._top;
  }

  get left(): number {
    return this._left;
  }

  get height(): number {
    return this._height;
  }

  get width(): number {
    return this._width;
  }

  /** Scrolloff actually applied: never more than half the window. */
  get scrolloff(): number {
    if (this._height <= 0) return 0;
    return Math.min(this._scrolloff, Math.floor((this._height - 1) / 2));
  }

  get maxTop(): number {
    return Math.max(0, this.totalLines() - this._height);
  }

  /** Visible line range `[start, end)`. */
  get range(): { start: number; end: number } {
    return { start: this._top, end: Math.min(this._top + this._height, this.totalLines()) };
  }

  // ── Vertical ──

  scrollTo(line: number): boolean {
    const next = clamp(line, 0, this.maxTop);
    if (next === this._top) return false;
    this._top = next;
    return true;
  }

  scrollBy(delta: number): boolean {
    return this.scrollTo(this._top + delta);
  }

  /** Re-apply the bounds after the document shrank or grew. */
  clamp(): boolean {
    return this.scrollTo(this._top);
  }

  /** Scroll the least amount that puts `line` inside the scrolloff window. */
  ensureVisible(line: number): boolean {
    const so = this.scrolloff;
    const lowest = line + so - (this._height - 1);
    const highest = line - so;
    return this.scrollTo(clamp(this._top, lowest, highest));
  }

  alignCursor(line: number, alignment: Alignment): boolean {
    const so = this.scrolloff;
    switch (alignment) {
      case 'top':
        return this.scrollTo(line - so);
      case 'center':
        return this.scrollTo(line - Math.floor((this._height - 1) / 2));
      case 'bottom':
        return this.scrollTo(line + so - (this._height - 1));
    }
  }

  /**
   * Lines the cursor may sit on without the viewport having to move. At the
   * start or end of the document the scrolloff margin does not apply.
   */
  cursorBounds(): CursorBounds {
    const total = this.totalLines();
    const so = this.scrolloff;
    const min = this._top === 0 ? 0 : this._top + so;
    const max = this._top >= this.maxTop
      ? Math.max(0, total - 1)
      : this._top + this._height - 1 - so;
    return { min, max: Math.max(min, max) };
  }

  /**
   * Change the window size. When `anchor` (the cursor line) is given, keep
   * it at the same relative screen position if the document allows.
   */
  setSize(height: number, width: number, anchor?: number): boolean {
    const before = { top: this._top, height: this._height, width: this._width, left: this._left };
    const nextHeight = Math.max(0, height);

    if (anchor !== undefined && before.height > 1 && nextHeight > 1) {
      const ratio = (anchor - before.top) / (before.height - 1);
      this._height = nextHeight;
      this.scrollTo(anchor - Math.round(ratio * (nextHeight - 1)));
    } else {
      this._height = nextHeight;
    }
    this._width = Math.max(0, width);
    if (anchor !== undefined) this.ensureVisible(anchor);
    this.clamp();

    return before.top !== this._top
      || before.height !== this._height
      || before.width !== this._width
      || before.left !== this._left;
  }

  // ── Horizontal ──

  /** `widest` is the widest row currently on screen, in columns. */
  setLeft(column: number, widest: number): boolean {
    const next = clamp(column, 0, Math.max(0, widest - this._width));
    if (next === this._left) return false;
    this._left = next;
    return true;
  }

  scrollHorizontal(delta: number, widest: number): boolean {
    return this.setLeft(this._left + delta, widest);
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
