/**
 * Arena-backed value tree with per-container collapse flags and the
 * visible-row counts the line flattener descends on.
 *
 * Each container keeps two sums over its children (`childRows`,
 * `childClosers`) and its own contribution (`rows`, `closers`). A collapse
 * change recomputes one node's contribution and pushes the difference up
 * the parent chain until it reaches zero, so toggles cost O(depth) no
 * matter how large the document is. Bulk policies (expand all, collapse
 * all, recursive toggles) set flags directly and recount once, bottom-up.
 *
 * The tree can be "growing": the parser appends nodes while the pager is
 * already showing the document. Appends also propagate in O(depth).
 *
 * @module tree/ValueTree
 */

import {
  NO_PARENT,
  ROOT_ID,
  isContainer,
} from './types';
import type {
  ContainerKind,
  ContainerNode,
  InputMode,
  ScalarKind,
  TreeNode,
  ViewMode,
} from './types';

export interface ValueTreeOptions {
  mode?: InputMode;
  /** Containers at this depth or deeper start collapsed. */
  collapseDepth?: number | null;
}

export interface NodeKey {
  key: string;
  keyRaw: string;
}

export class ValueTree {
  readonly nodes: TreeNode[] = [];
  readonly mode: InputMode;
  private readonly collapseDepth: number | null;
  private _growing = true;
  private _version = 0;

  constructor(options: ValueTreeOptions = {}) {
    this.mode = options.mode ?? 'json';
    this.collapseDepth = options.collapseDepth ?? null;
    this.nodes.push({
      id: ROOT_ID,
      parent: NO_PARENT,
      depth: -1,
      index: 0,
      key: null,
      keyRaw: null,
      kind: 'array',
      children: [],
      collapsed: false,
      closed: false,
      synthetic: true,
      childRows: 0,
      childClosers: 0,
      rows: 0,
      closers: 0,
    });
  }

  // ── Lifecycle ──

  /** True until the parser has finished (or failed) feeding this tree. */
  get growing(): boolean {
    return this._growing;
  }

  /** Bumped on every structural or collapse change. */
  get version(): number {
    return this._version;
  }

  get size(): number {
    return this.nodes.length;
  }

  /** The tree holds at least one top-level value. */
  get hasContent(): boolean {
    return this.root.children.length > 0;
  }

  get root(): ContainerNode {
    return this.container(ROOT_ID);
  }

  finish(): void {
    if (!this._growing) return;
    this._growing = false;
    this.root.closed = true;
    this._version++;
  }

  // ── Building (parser side) ──

  appendScalar(
    parent: number,
    key: NodeKey | null,
    kind: ScalarKind,
    text: string,
  ): number {
    const p = this.container(parent);
    const id = this.nodes.length;
    this.nodes.push({
      id,
      parent,
      depth: p.depth + 1,
      index: p.children.length,
      key: key?.key ?? null,
      keyRaw: key?.keyRaw ?? null,
      kind,
      text,
    });
    this.attach(p, id);
    return id;
  }

  appendString(parent: number, key: NodeKey | null, raw: string, value: string): number {
    const p = this.container(parent);
    const id = this.nodes.length;
    this.nodes.push({
      id,
      parent,
      depth: p.depth + 1,
      index: p.children.length,
      key: key?.key ?? null,
      keyRaw: key?.keyRaw ?? null,
      kind: 'string',
      raw,
      value,
    });
    this.attach(p, id);
    return id;
  }

  appendContainer(parent: number, key: NodeKey | null, kind: ContainerKind): number {
    const p = this.container(parent);
    const id = this.nodes.length;
    const depth = p.depth + 1;
    this.nodes.push({
      id,
      parent,
      depth,
      index: p.children.length,
      key: key?.key ?? null,
      keyRaw: key?.keyRaw ?? null,
      kind,
      children: [],
      collapsed: this.collapseDepth !== null && depth >= this.collapseDepth,
      closed: false,
      synthetic: false,
      childRows: 0,
      childClosers: 0,
      rows: 1,
      closers: 0,
    });
    this.attach(p, id);
    return id;
  }

  closeContainer(id: number): void {
    const node = this.container(id);
    if (node.closed) return;
    node.closed = true;
    this._version++;
  }

  private attach(parent: ContainerNode, id: number): void {
    parent.children.push(id);
    this.propagate(parent, this.rowsOf(id), this.closersOf(id));
    this._version++;
  }

  // ── Collapse state ──

  /** Flip one container. Scalars and empty containers are left alone. */
  toggleCollapse(id: number): boolean {
    const node = this.collapsible(id);
    if (!node) return false;
    return this.setCollapsed(id, !node.collapsed);
  }

  setCollapsed(id: number, collapsed: boolean): boolean {
    const node = this.collapsible(id);
    if (!node || node.collapsed === collapsed) return false;

    const beforeRows = node.rows;
    const beforeClosers = node.closers;
    node.collapsed = collapsed;
    recomputeOwn(node);
    this.propagateFrom(node, node.rows - beforeRows, node.closers - beforeClosers);
    this._version++;
    return true;
  }

  /** Set the flag on `id` and every container below it. */
  setSubtreeCollapsed(id: number, collapsed: boolean): boolean {
    const top = this.collapsible(id);
    if (!top) return false;

    const end = this.subtreeEnd(id);
    let changed = false;
    for (let i = id; i < end; i++) {
      const node = this.nodes[i];
      if (isContainer(node) && node.children.length > 0 && node.collapsed !== collapsed) {
        node.collapsed = collapsed;
        changed = true;
      }
    }
    if (!changed) return false;

    const beforeRows = top.rows;
    const beforeClosers = top.closers;
    this.recount(id, end);
    this.propagateFrom(top, top.rows - beforeRows, top.closers - beforeClosers);
    this._version++;
    return true;
  }

  /**
   * Collapse every container at `depth` or deeper (0 collapses the
   * top-level values themselves). Refused while the tree is growing.
   */
  collapseAll(depth = 0): boolean {
    if (this._growing) return false;
    for (const node of this.nodes) {
      if (isContainer(node) && !node.synthetic && node.children.length > 0) {
        node.collapsed = node.depth >= depth;
      }
    }
    this.recount(ROOT_ID, this.nodes.length);
    this._version++;
    return true;
  }

  expandAll(): boolean {
    if (this._growing) return false;
    for (const node of this.nodes) {
      if (isContainer(node)) node.collapsed = false;
    }
    this.recount(ROOT_ID, this.nodes.length);
    this._version++;
    return true;
  }

  /**
   * Recompute counts for the contiguous id range [start, end), children
   * before parents. Nodes outside the range keep their counts.
   */
  private recount(start: number, end: number): void {
    for (let i = start; i < end; i++) {
      const node = this.nodes[i];
      if (isContainer(node)) {
        node.childRows = 0;
        node.childClosers = 0;
      }
    }
    for (let i = end - 1; i >= start; i--) {
      const node = this.nodes[i];
      if (isContainer(node)) recomputeOwn(node);
      if (i > start) {
        const parent = this.container(node.parent);
        parent.childRows += this.rowsOf(i);
        parent.childClosers += this.closersOf(i);
      }
    }
  }

  /** Apply a change of `node`'s own contribution to its ancestors. */
  private propagateFrom(node: ContainerNode, dRows: number, dClosers: number): void {
    if (node.parent === NO_PARENT) return;
    this.propagate(this.container(node.parent), dRows, dClosers);
  }

  private propagate(start: ContainerNode, dRows: number, dClosers: number): void {
    let node: ContainerNode | null = start;
    let rowsDelta = dRows;
    let closersDelta = dClosers;
    while (node && (rowsDelta !== 0 || closersDelta !== 0)) {
      const beforeRows = node.rows;
      const beforeClosers = node.closers;
      node.childRows += rowsDelta;
      node.childClosers += closersDelta;
      recomputeOwn(node);
      rowsDelta = node.rows - beforeRows;
      closersDelta = node.closers - beforeClosers;
      node = node.parent === NO_PARENT ? null : this.container(node.parent);
    }
  }

  private collapsible(id: number): ContainerNode | null {
    const node = this.nodes[id];
    if (!node || !isContainer(node) || node.synthetic || node.children.length === 0) return null;
    return node;
  }

  // ── Counts ──

  rowsOf(id: number): number {
    const node = this.nodes[id];
    return isContainer(node) ? node.rows : 1;
  }

  closersOf(id: number): number {
    const node = this.nodes[id];
    return isContainer(node) ? node.closers : 0;
  }

  /** Rows `id` occupies in the given display mode. */
  nodeLineCount(id: number, mode: ViewMode): number {
    return mode === 'line' ? this.rowsOf(id) + this.closersOf(id) : this.rowsOf(id);
  }

  visibleLineCount(mode: ViewMode): number {
    return this.nodeLineCount(ROOT_ID, mode);
  }

  // ── Navigation helpers ──

  node(id: number): TreeNode {
    const node = this.nodes[id];
    if (!node) throw new RangeError(`No node with id ${id}`);
    return node;
  }

  container(id: number): ContainerNode {
    const node = this.node(id);
    if (!isContainer(node)) throw new TypeError(`Node ${id} is not a container`);
    return node;
  }

  /** Ancestors of `id`, nearest first, excluding the synthetic root. */
  ancestors(id: number): number[] {
    const result: number[] = [];
    let current = this.node(id).parent;
    while (current !== NO_PARENT && current !== ROOT_ID) {
      result.push(current);
      current = this.node(current).parent;
    }
    return result;
  }

  /** No ancestor of `id` is collapsed. The root itself is never shown. */
  isVisible(id: number): boolean {
    if (id === ROOT_ID) return false;
    for (const ancestor of this.ancestors(id)) {
      if (this.container(ancestor).collapsed) return false;
    }
    return true;
  }

  /** The outermost collapsed ancestor, or `id` itself when it is visible. */
  nearestVisible(id: number): number {
    let target = id;
    for (const ancestor of this.ancestors(id)) {
      if (this.container(ancestor).collapsed) target = ancestor;
    }
    return target;
  }

  nextSibling(id: number): number | null {
    const node = this.node(id);
    if (node.parent === NO_PARENT) return null;
    const siblings = this.container(node.parent).children;
    return node.index + 1 < siblings.length ? siblings[node.index + 1] : null;
  }

  prevSibling(id: number): number | null {
    const node = this.node(id);
    if (node.parent === NO_PARENT || node.index === 0) return null;
    return this.container(node.parent).children[node.index - 1];
  }

  /** One past the last id of `id`'s subtree. */
  subtreeEnd(id: number): number {
    let current = this.node(id);
    while (isContainer(current) && current.children.length > 0) {
      current = this.node(current.children[current.children.length - 1]);
    }
    return current.id + 1;
  }

  /** Expanded container with at least one child. */
  isOpenContainer(id: number): boolean {
    const node = this.nodes[id];
    return !!node && isContainer(node) && !node.collapsed && node.children.length > 0;
  }
}

function recomputeOwn(node: ContainerNode): void {
  if (node.synthetic) {
    node.rows = node.childRows;
    node.closers = node.childClosers;
  } else if (node.collapsed || node.children.length === 0) {
    node.rows = 1;
    node.closers = 0;
  } else {
    node.rows = 1 + node.childRows;
    node.closers = 1 + node.childClosers;
  }
}
