/**
 * Turns a Line into token-typed text segments. The renderer styles each
 * segment by its token; `formatLinePlain` joins them for dump output,
 * copying and tests.
 *
 * Segments that show a node's key or value text carry `field` so search
 * match ranges (offsets into the raw key or value text) map straight onto
 * them.
 *
 * @module flatten/lineFormat
 */

import { isContainer } from '../tree';
import type { TreeNode, ValueTree, ViewMode } from '../tree';
import type { Line } from './LineFlattener';

export type TokenKind =
  | 'indent'
  | 'key'
  | 'label'
  | 'punct'
  | 'string'
  | 'number'
  | 'bool'
  | 'null'
  | 'preview';

export interface Segment {
  text: string;
  token: TokenKind;
  field?: 'key' | 'value';
}

export const INDENT = '  ';

const IDENTIFIER_RE = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function lineSegments(tree: ValueTree, line: Line, mode: ViewMode): Segment[] {
  const node = tree.node(line.node);
  const segments: Segment[] = [];
  if (line.depth > 0) segments.push({ text: INDENT.repeat(line.depth), token: 'indent' });

  if (line.role === 'container-close') {
    segments.push({ text: node.kind === 'object' ? '}' : ']', token: 'punct' });
    if (!line.last) segments.push({ text: ',', token: 'punct' });
    return segments;
  }

  pushLabel(segments, tree, line, mode);

  switch (line.role) {
    case 'container-open':
      segments.push({ text: node.kind === 'object' ? '{' : '[', token: 'punct' });
      return segments;
    case 'container-empty':
      segments.push({ text: node.kind === 'object' ? '{}' : '[]', token: 'punct' });
      break;
    case 'container-collapsed':
      segments.push({ text: node.kind === 'object' ? '{...}' : '[...]', token: 'preview' });
      if (mode === 'data') segments.push({ text: ` ${childSummary(node)}`, token: 'preview' });
      break;
    case 'scalar':
      pushValue(segments, node);
      break;
  }

  if (mode === 'line' && !line.last) segments.push({ text: ',', token: 'punct' });
  return segments;
}

export function formatLinePlain(tree: ValueTree, line: Line, mode: ViewMode): string {
  return lineSegments(tree, line, mode).map((s) => s.text).join('');
}

function pushLabel(segments: Segment[], tree: ValueTree, line: Line, mode: ViewMode): void {
  const node = tree.node(line.node);
  if (node.keyRaw !== null) {
    if (mode === 'data' && IDENTIFIER_RE.test(node.keyRaw)) {
      segments.push({ text: node.keyRaw, token: 'key', field: 'key' });
    } else {
      segments.push({ text: '"', token: 'punct' });
      segments.push({ text: node.keyRaw, token: 'key', field: 'key' });
      segments.push({ text: '"', token: 'punct' });
    }
    segments.push({ text: ': ', token: 'punct' });
    return;
  }
  if (mode !== 'data') return;
  if (line.arrayIndex !== null) {
    segments.push({ text: `[${line.arrayIndex}]`, token: 'label' });
    segments.push({ text: ': ', token: 'punct' });
  } else if (tree.mode === 'jsonl') {
    segments.push({ text: `[${node.index}]`, token: 'label' });
    segments.push({ text: ': ', token: 'punct' });
  }
}

function pushValue(segments: Segment[], node: TreeNode): void {
  switch (node.kind) {
    case 'string':
      segments.push({ text: '"', token: 'punct' });
      segments.push({ text: node.raw, token: 'string', field: 'value' });
      segments.push({ text: '"', token: 'punct' });
      return;
    case 'number':
    case 'bool':
    case 'null':
      segments.push({ text: node.text, token: node.kind, field: 'value' });
      return;
    default:
      return;
  }
}

function childSummary(node: TreeNode): string {
  if (!isContainer(node)) return '';
  const n = node.children.length;
  if (node.kind === 'object') return n === 1 ? '(1 key)' : `(${n} keys)`;
  return n === 1 ? '(1 item)' : `(${n} items)`;
}
