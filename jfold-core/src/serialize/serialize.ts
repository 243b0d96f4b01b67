/**
 * Text forms of a node for the clipboard: the value as JSON and its path
 * as a jq-style expression.
 *
 * Numbers and strings are written as they appeared in the source, so a
 * copied value keeps the document's exact number formatting and escapes.
 *
 * @module serialize
 */

import { ROOT_ID, isContainer } from '../tree';
import type { ValueTree } from '../tree';

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface SerializeOptions {
  /** Spaces per level; 0 writes everything on one line. */
  indent?: number;
}

export function serializeValue(tree: ValueTree, id: number, options: SerializeOptions = {}): string {
  const indent = options.indent ?? 2;
  const out: string[] = [];
  write(tree, id, 0, indent, out);
  return out.join('');
}

function write(tree: ValueTree, id: number, level: number, indent: number, out: string[]): void {
  const node = tree.node(id);
  if (!isContainer(node)) {
    out.push(node.kind === 'string' ? `"${node.raw}"` : node.text);
    return;
  }

  const [open, close] = node.kind === 'object' ? ['{', '}'] : ['[', ']'];
  if (node.children.length === 0) {
    out.push(open, close);
    return;
  }

  const newline = indent > 0 ? '\n' : '';
  const pad = (n: number): string => ' '.repeat(indent * n);
  const colon = indent > 0 ? ': ' : ':';

  out.push(open, newline);
  node.children.forEach((child, i) => {
    out.push(pad(level + 1));
    const keyRaw = tree.node(child).keyRaw;
    if (node.kind === 'object' && keyRaw !== null) out.push(`"${keyRaw}"`, colon);
    write(tree, child, level + 1, indent, out);
    if (i < node.children.length - 1) out.push(',');
    out.push(newline);
  });
  out.push(pad(level), close);
}

/**
 * jq-style path: `.`, `.a.b[0]`, `.["weird key"]`. Values of a
 * line-delimited stream are prefixed with their position, e.g. `[2].a`.
 */
export function pathOf(tree: ValueTree, id: number): string {
  if (id === ROOT_ID) return '.';
  const chain = [id, ...tree.ancestors(id)].reverse();
  let path = '';
  for (const step of chain) {
    const node = tree.node(step);
    const parent = tree.container(node.parent);
    if (parent.synthetic) {
      if (tree.mode === 'jsonl') path += `[${node.index}]`;
    } else if (parent.kind === 'array') {
      path += `[${node.index}]`;
    } else if (node.keyRaw !== null) {
      path += IDENTIFIER_RE.test(node.keyRaw) ? `.${node.keyRaw}` : `["${node.keyRaw}"]`;
    }
  }
  if (path === '') return '.';
  return path.startsWith('.') || tree.mode === 'jsonl' ? path : `.${path}`;
}
