/**
 * Cursor, collapse and scroll operations over one document.
 *
 * The cursor is held as a node plus a flag saying whether it sits on that
 * node's closing row; the global line index is derived from it after every
 * change to collapse state, view mode or document size. When the cursor's
 * node becomes hidden it moves to the outermost collapsed ancestor, which is
 * the row that now stands in for it.
 *
 * Every operation returns whether anything changed so the caller can skip a
 * redraw.
 *
 * @module controller/DocumentController
 */

import { LineFlattener, formatLinePlain } from '../flatten';
import type { Line } from '../flatten';
import { ROOT_ID, isContainer } from '../tree';
import type { ValueTree, ViewMode } from '../tree';
import { Viewport } from '../viewport';
import type { Alignment } from '../viewport';
import { pathOf, serializeValue } from '../serialize';
import type { SearchDirection } from '../search';

export interface ControllerOptions {
  height: number;
  width: number;
  scrolloff?: number;
  mode?: ViewMode;
}

export interface Cursor {
  line: number;
  node: number;
  /** On the node's closing delimiter row rather than its first row. */
  onClose: boolean;
}

export type SiblingDirection = 'next' | 'prev';

export class DocumentController {
  readonly flattener: LineFlattener;
  readonly viewport: Viewport;
  private _cursor: Cursor | null = null;

  constructor(
    readonly tree: ValueTree,
    options: ControllerOptions,
  ) {
    this.flattener = new LineFlattener(tree, options.mode ?? 'line');
    this.viewport = new Viewport(() => this.flattener.totalLines, options);
    this.reattach();
  }

  // ── State ──

  /** Null while the document has no rows. */
  get cursor(): Cursor | null {
    return this._cursor;
  }

  get mode(): ViewMode {
    return this.flattener.mode;
  }

  get totalLines(): number {
    return this.flattener.totalLines;
  }

  get focusedLine(): Line | null {
    return this._cursor ? this.flattener.lineAt(this._cursor.line) : null;
  }

  /** Rows currently inside the viewport. */
  visibleLines(): Line[] {
    const { start, end } = this.viewport.range;
    return this.flattener.linesIn(start, end);
  }

  // ── Vertical movement ──

  move(delta: number): boolean {
    if (!this._cursor) return false;
    return this.moveToLine(this._cursor.line + delta);
  }

  moveToTop(): boolean {
    return this.moveToLine(0);
  }

  moveToBottom(): boolean {
    return this.moveToLine(this.totalLines - 1);
  }

  /** Put the cursor on line `index`, clamped to the document. */
  moveToLine(index: number): boolean {
    const total = this.totalLines;
    if (total === 0) return false;
    const target = Math.max(0, Math.min(total - 1, index));
    const changed = this.placeCursor(target);
    return this.viewport.ensureVisible(target) || changed;
  }

  // ── Structural movement ──

  moveToSibling(direction: SiblingDirection): boolean {
    if (!this._cursor) return false;
    const sibling = direction === 'next'
      ? this.tree.nextSibling(this._cursor.node)
      : this.tree.prevSibling(this._cursor.node);
    return sibling === null ? false : this.focusNode(sibling);
  }

  moveToFirstSibling(): boolean {
    return this.moveToSiblingAt('first');
  }

  moveToLastSibling(): boolean {
    return this.moveToSiblingAt('last');
  }

  moveToParent(): boolean {
    if (!this._cursor) return false;
    const parent = this.tree.node(this._cursor.node).parent;
    if (parent === ROOT_ID) return false;
    return this.focusNode(parent);
  }

  /** Jump between an expanded container's opening and closing rows (line mode). */
  moveToMatchingDelimiter(): boolean {
    const cursor = this._cursor;
    if (!cursor || this.mode !== 'line' || !this.tree.isOpenContainer(cursor.node)) return false;
    return this.focusNode(cursor.node, !cursor.onClose);
  }

  /** `h`: collapse an expanded container, otherwise go to the parent. */
  collapseOrParent(): boolean {
    if (!this._cursor) return false;
    if (this.tree.isOpenContainer(this._cursor.node)) return this.collapseFocused();
    return this.moveToParent();
  }

  /** `l`: expand a collapsed container, or step into an expanded one. */
  expandOrFirstChild(): boolean {
    const cursor = this._cursor;
    if (!cursor) return false;
    const node = this.tree.node(cursor.node);
    if (!isContainer(node) || node.children.length === 0) return false;
    if (node.collapsed) return this.expandFocused();
    return this.focusNode(node.children[0]);
  }

  // ── Collapse ──

  toggleFocusedCollapse(): boolean {
    if (!this._cursor) return false;
    return this.afterCollapse(this.tree.toggleCollapse(this._cursor.node));
  }

  expandFocused(): boolean {
    if (!this._cursor) return false;
    return this.afterCollapse(this.tree.setCollapsed(this._cursor.node, false));
  }

  collapseFocused(): boolean {
    if (!this._cursor) return false;
    return this.afterCollapse(this.tree.setCollapsed(this._cursor.node, true));
  }

  expandFocusedRecursive(): boolean {
    if (!this._cursor) return false;
    return this.afterCollapse(this.tree.setSubtreeCollapsed(this._cursor.node, false));
  }

  collapseFocusedRecursive(): boolean {
    if (!this._cursor) return false;
    return this.afterCollapse(this.tree.setSubtreeCollapsed(this._cursor.node, true));
  }

  /** Refused (false) while the document is still loading. */
  expandAll(): boolean {
    return this.afterCollapse(this.tree.expandAll());
  }

  /** Collapse every container at `maxDepth` or deeper. Refused while loading. */
  collapseAll(maxDepth = 0): boolean {
    return this.afterCollapse(this.tree.collapseAll(maxDepth));
  }

  /** Expand every collapsed ancestor of `id` and put the cursor on it. */
  revealNode(id: number): boolean {
    if (id === ROOT_ID || id >= this.tree.size) return false;
    let expanded = false;
    for (const ancestor of this.tree.ancestors(id)) {
      if (this.tree.setCollapsed(ancestor, false)) expanded = true;
    }
    if (expanded) this.reattach();
    return this.focusNode(id) || expanded;
  }

  // ── Scrolling ──

  /** ctrl-e / ctrl-y: move the window; the cursor follows only to stay inside it. */
  scrollViewport(delta: number): boolean {
    const cursor = this._cursor;
    if (!cursor || !this.viewport.scrollBy(delta)) return false;
    const { min, max } = this.viewport.cursorBounds();
    const target = Math.max(min, Math.min(max, cursor.line));
    if (target !== cursor.line) this.placeCursor(target);
    return true;
  }

  halfPageDown(count = 1): boolean {
    return this.scrollWithCursor(this.halfPage() * count);
  }

  halfPageUp(count = 1): boolean {
    return this.scrollWithCursor(-this.halfPage() * count);
  }

  pageDown(count = 1): boolean {
    return this.scrollWithCursor(this.fullPage() * count);
  }

  pageUp(count = 1): boolean {
    return this.scrollWithCursor(-this.fullPage() * count);
  }

  alignFocused(alignment: Alignment): boolean {
    if (!this._cursor) return false;
    return this.viewport.alignCursor(this._cursor.line, alignment);
  }

  /** Horizontal scroll, bounded by the widest row on screen. */
  scrollHorizontal(delta: number): boolean {
    return this.viewport.scrollHorizontal(delta, this.widestVisibleRow());
  }

  // ── View ──

  setViewMode(mode: ViewMode): boolean {
    if (mode === this.mode) return false;
    const screenRow = this._cursor ? this._cursor.line - this.viewport.top : 0;
    this.flattener.mode = mode;
    if (this._cursor && mode === 'data') this._cursor.onClose = false;
    this.reattach();
    if (this._cursor) this.viewport.scrollTo(this._cursor.line - screenRow);
    this.keepCursorVisible();
    this.viewport.setLeft(this.viewport.left, this.widestVisibleRow());
    return true;
  }

  toggleViewMode(): boolean {
    return this.setViewMode(this.mode === 'line' ? 'data' : 'line');
  }

  resize(height: number, width: number): boolean {
    const changed = this.viewport.setSize(height, width, this._cursor?.line);
    this.keepCursorVisible();
    return changed;
  }

  /** Call after the loader appended nodes. */
  documentGrew(): boolean {
    const before = this._cursor ? { ...this._cursor } : null;
    const top = this.viewport.top;
    this.reattach();
    const after = this._cursor;
    return before === null
      ? after !== null
      : after === null || after.line !== before.line || this.viewport.top !== top;
  }

  // ── Clipboard text ──

  focusedValueText(): string | null {
    return this._cursor ? serializeValue(this.tree, this._cursor.node) : null;
  }

  focusedPathText(): string | null {
    return this._cursor ? pathOf(this.tree, this._cursor.node) : null;
  }

  /** The focused node's key, or its index for array items. */
  focusedKeyText(): string | null {
    if (!this._cursor) return null;
    const node = this.tree.node(this._cursor.node);
    if (node.key !== null) return node.key;
    const parent = this.tree.container(node.parent);
    return parent.synthetic && this.tree.mode === 'json' ? null : String(node.index);
  }

  /** Node a search in `direction` should start after (or before). */
  searchAnchor(direction: SearchDirection): number {
    const cursor = this._cursor;
    if (!cursor) return ROOT_ID;
    if (!cursor.onClose) return cursor.node;
    const end = this.tree.subtreeEnd(cursor.node);
    return direction === 'forward' ? end - 1 : end;
  }

  // ── Internals ──

  private moveToSiblingAt(which: 'first' | 'last'): boolean {
    if (!this._cursor) return false;
    const parent = this.tree.node(this._cursor.node).parent;
    const siblings = this.tree.container(parent).children;
    return this.focusNode(which === 'first' ? siblings[0] : siblings[siblings.length - 1]);
  }

  /** Move the cursor to a visible node's first row, or its closing row. */
  private focusNode(id: number, onClose = false): boolean {
    const line = onClose ? this.flattener.closeLineOf(id) : this.flattener.lineIndexOf(id);
    if (line === null) return false;
    const before = this._cursor;
    this._cursor = { line, node: id, onClose };
    const scrolled = this.viewport.ensureVisible(line);
    return scrolled || !before || before.line !== line || before.node !== id;
  }

  private placeCursor(index: number): boolean {
    const line = this.flattener.lineAt(index);
    if (!line) return false;
    const before = this._cursor;
    this._cursor = { line: index, node: line.node, onClose: line.role === 'container-close' };
    return !before || before.line !== index;
  }

  private afterCollapse(changed: boolean): boolean {
    if (!changed) return false;
    this.reattach();
    return true;
  }

  /** Re-derive the cursor line after the visible sequence changed. */
  private reattach(): void {
    const cursor = this._cursor;
    if (!cursor) {
      if (this.totalLines > 0) this.placeCursor(0);
      this.viewport.clamp();
      return;
    }

    const id = this.tree.nearestVisible(cursor.node);
    let onClose = cursor.onClose && id === cursor.node;
    let line = onClose ? this.flattener.closeLineOf(id) : null;
    if (line === null) {
      onClose = false;
      line = this.flattener.lineIndexOf(id);
    }
    if (line === null) {
      this._cursor = null;
      this.reattach();
      return;
    }
    this._cursor = { line, node: id, onClose };
    this.viewport.clamp();
    this.viewport.ensureVisible(line);
  }

  private keepCursorVisible(): void {
    this.viewport.clamp();
    if (this._cursor) this.viewport.ensureVisible(this._cursor.line);
  }

  private scrollWithCursor(delta: number): boolean {
    const cursor = this._cursor;
    if (!cursor || delta === 0) return false;
    const scrolled = this.viewport.scrollBy(delta);
    const total = this.totalLines;
    const target = Math.max(0, Math.min(total - 1, cursor.line + delta));
    const moved = this.placeCursor(target);
    this.viewport.ensureVisible(target);
    return scrolled || moved;
  }

  private halfPage(): number {
    return Math.max(1, Math.floor(this.viewport.height / 2));
  }

  private fullPage(): number {
    return Math.max(1, this.viewport.height - 2);
  }

  private widestVisibleRow(): number {
    let widest = 0;
    for (const line of this.visibleLines()) {
      widest = Math.max(widest, formatLinePlain(this.tree, line, this.mode).length);
    }
    return widest;
  }
}
