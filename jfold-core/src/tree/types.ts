/**
 * Arena node shapes for the value tree.
 *
 * Nodes are addressed by integer ids into a single array. Parent links are
 * plain ids; the arena owns every node. Ids are assigned in document
 * (pre-)order, so a subtree always occupies a contiguous id range.
 *
 * @module tree/types
 */

export type ScalarKind = 'null' | 'bool' | 'number';
export type ContainerKind = 'object' | 'array';
export type ValueKind = ScalarKind | 'string' | ContainerKind;

/** Input grammar: one JSON value, or a stream of whitespace-separated values. */
export type InputMode = 'json' | 'jsonl';

/**
 * Display convention. `line` shows JSON-like rows with quoted keys, closing
 * delimiters and commas; `data` elides closing rows and commas and labels
 * array items with their index.
 */
export type ViewMode = 'line' | 'data';

/** Sentinel parent id of the synthetic root. */
export const NO_PARENT = -1;

/** Id of the synthetic root in every tree. */
export const ROOT_ID = 0;

interface NodeBase {
  id: number;
  parent: number;
  /** Indentation level; top-level values are 0, the synthetic root is -1. */
  depth: number;
  /** Position within the parent's children. */
  index: number;
  /** Unescaped object key, or null for array items and top-level values. */
  key: string | null;
  /** Key as written in the source (escapes kept, quotes stripped). */
  keyRaw: string | null;
}

export interface ScalarNode extends NodeBase {
  kind: ScalarKind;
  /** Source text: `true`, `null`, `-1.50e3`... */
  text: string;
}

export interface StringNode extends NodeBase {
  kind: 'string';
  raw: string;
  value: string;
}

export interface ContainerNode extends NodeBase {
  kind: ContainerKind;
  children: number[];
  collapsed: boolean;
  /** False while the parser has not seen the closing delimiter. */
  closed: boolean;
  /** Holds the top-level values; never rendered, never collapsed. */
  synthetic: boolean;
  /** Sum of `rows` over children, regardless of this node's collapse state. */
  childRows: number;
  /** Sum of `closers` over children. */
  childClosers: number;
  /** Visible non-closing rows this subtree contributes. */
  rows: number;
  /** Visible closing-delimiter rows this subtree contributes. */
  closers: number;
}

export type TreeNode = ScalarNode | StringNode | ContainerNode;

export function isContainer(node: TreeNode): node is ContainerNode {
  return node.kind === 'object' || node.kind === 'array';
}
