/**
 * Answers "which row is at visible index i" and "where does node n sit"
 * against a ValueTree without materializing the flattened document.
 *
 * `lineAt` descends from the root, skipping whole subtrees by their
 * visible-line counts. Each container's children get a prefix-sum array
 * on first use so the child holding a given offset is found by binary
 * search; every cached array is dropped when the tree's version moves.
 *
 * @module flatten/LineFlattener
 */

import { ROOT_ID, isContainer } from '../tree';
import type { ContainerNode, ValueTree, ViewMode } from '../tree';

export type LineRole =
  | 'container-open'
  | 'container-close'
  | 'container-collapsed'
  | 'container-empty'
  | 'scalar';

export interface Line {
  /** Global visible index. */
  index: number;
  node: number;
  role: LineRole;
  /** Indentation level, 0 for top-level values. */
  depth: number;
  key: string | null;
  /** Position in the parent array, or null for object members and top-level values. */
  arrayIndex: number | null;
  /** No trailing comma follows this row. */
  last: boolean;
}

export interface LineRange {
  first: number;
  last: number;
}

export class LineFlattener {
  private _mode: ViewMode;
  private prefixCache = new Map<number, number[]>();
  private cacheVersion = -1;

  constructor(
    readonly tree: ValueTree,
    mode: ViewMode = 'line',
  ) {
    this._mode = mode;
  }

  get mode(): ViewMode {
    return this._mode;
  }

  set mode(mode: ViewMode) {
    if (mode === this._mode) return;
    this._mode = mode;
    this.prefixCache.clear();
  }

  get totalLines(): number {
    return this.tree.visibleLineCount(this._mode);
  }

  // ── Index → line ──

  lineAt(index: number): Line | null {
    if (index < 0 || index >= this.totalLines) return null;

    let parent = this.tree.root;
    let offset = index;
    for (;;) {
      const prefix = this.prefixOf(parent);
      const slot = upperBound(prefix, offset) - 1;
      const id = parent.children[slot];
      offset -= prefix[slot];

      if (offset === 0) return this.firstLineOf(id, index);
      // offset > 0 only happens inside an open container
      const count = this.tree.nodeLineCount(id, this._mode);
      if (this._mode === 'line' && offset === count - 1) return this.makeLine(index, id, 'container-close');
      parent = this.tree.container(id);
      offset -= 1;
    }
  }

  /** Rows `[start, end)`, clamped to the document. */
  linesIn(start: number, end: number): Line[] {
    const from = Math.max(0, start);
    const to = Math.min(end, this.totalLines);
    const result: Line[] = [];
    let line = from < to ? this.lineAt(from) : null;
    while (line && line.index < to) {
      result.push(line);
      line = line.index + 1 < to ? this.nextLine(line) : null;
    }
    return result;
  }

  /** The row after `line`, found by stepping through the tree. */
  nextLine(line: Line): Line | null {
    const index = line.index + 1;
    if (line.role === 'container-open') {
      return this.firstLineOf(this.tree.container(line.node).children[0], index);
    }

    let current = line.node;
    for (;;) {
      const sibling = this.tree.nextSibling(current);
      if (sibling !== null) return this.firstLineOf(sibling, index);
      const parent = this.tree.node(current).parent;
      if (parent === ROOT_ID) return null;
      if (this._mode === 'line') return this.makeLine(index, parent, 'container-close');
      current = parent;
    }
  }

  // ── Node → index ──

  /** Global index of the node's first row, or null when it is hidden. */
  lineIndexOf(id: number): number | null {
    if (!this.tree.isVisible(id)) return null;
    let index = 0;
    let current = id;
    while (current !== ROOT_ID) {
      const node = this.tree.node(current);
      index += this.prefixOf(this.tree.container(node.parent))[node.index];
      if (node.parent !== ROOT_ID) index += 1;
      current = node.parent;
    }
    return index;
  }

  /** First and last rows the node occupies, or null when it is hidden. */
  lineRangeOf(id: number): LineRange | null {
    const first = this.lineIndexOf(id);
    if (first === null) return null;
    return { first, last: first + this.tree.nodeLineCount(id, this._mode) - 1 };
  }

  /** Row index of the node's closing delimiter, when it has one in this mode. */
  closeLineOf(id: number): number | null {
    if (this._mode !== 'line' || !this.tree.isOpenContainer(id)) return null;
    const range = this.lineRangeOf(id);
    return range ? range.last : null;
  }

  // ── Internals ──

  private firstLineOf(id: number, index: number): Line {
    const node = this.tree.node(id);
    if (!isContainer(node)) return this.makeLine(index, id, 'scalar');
    if (node.children.length === 0) return this.makeLine(index, id, 'container-empty');
    if (node.collapsed) return this.makeLine(index, id, 'container-collapsed');
    return this.makeLine(index, id, 'container-open');
  }

  private makeLine(index: number, id: number, role: LineRole): Line {
    const node = this.tree.node(id);
    const parent = this.tree.container(node.parent);
    return {
      index,
      node: id,
      role,
      depth: node.depth,
      key: node.key,
      arrayIndex: !parent.synthetic && parent.kind === 'array' ? node.index : null,
      last: parent.synthetic || node.index === parent.children.length - 1,
    };
  }

  /** prefix[k] = visible rows of children[0..k). Length is children + 1. */
  private prefixOf(node: ContainerNode): number[] {
    if (this.cacheVersion !== this.tree.version) {
      this.prefixCache.clear();
      this.cacheVersion = this.tree.version;
    }
    let prefix = this.prefixCache.get(node.id);
    if (!prefix) {
      prefix = new Array<number>(node.children.length + 1);
      prefix[0] = 0;
      for (let i = 0; i < node.children.length; i++) {
        prefix[i + 1] = prefix[i] + this.tree.nodeLineCount(node.children[i], this._mode);
      }
      this.prefixCache.set(node.id, prefix);
    }
    return prefix;
  }
}

/** First k with sorted[k] > value. */
function upperBound(sorted: number[], value: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] <= value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}
