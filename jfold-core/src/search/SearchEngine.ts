/**
 * Regex search over the value tree.
 *
 * Matches are collected in node-id order, which is document order, so a
 * match's position in the list also orders it on screen once its ancestors
 * are expanded. Collapse state is ignored; the caller reveals a match's
 * node when it jumps there.
 *
 * @module search/SearchEngine
 */

import { InvalidPatternError } from '../errors';
import { isContainer } from '../tree';
import type { TreeNode, ValueTree } from '../tree';

export type SearchScope = 'keys' | 'values' | 'all';
export type SearchDirection = 'forward' | 'backward';

export interface SearchMatch {
  node: number;
  field: 'key' | 'value';
  /** Offsets into the raw key or value text as displayed. */
  start: number;
  end: number;
}

export interface PatternOptions {
  /** Undefined means smart case: sensitive only when the pattern has an uppercase letter. */
  caseSensitive?: boolean;
  scope?: SearchScope;
}

export class SearchEngine {
  private _source = '';
  private regex: RegExp | null = null;
  private _scope: SearchScope = 'all';
  private _direction: SearchDirection = 'forward';
  private _matches: SearchMatch[] = [];
  private _current = -1;
  private scannedTree: ValueTree | null = null;
  private scanned = 0;

  get source(): string {
    return this._source;
  }

  get scope(): SearchScope {
    return this._scope;
  }

  get direction(): SearchDirection {
    return this._direction;
  }

  get matches(): readonly SearchMatch[] {
    return this._matches;
  }

  /** Index of the current match, or -1 before the first jump. */
  get current(): number {
    return this._current;
  }

  get active(): boolean {
    return this.regex !== null;
  }

  /**
   * Compile a new pattern. Throws InvalidPatternError and keeps the previous
   * state when the pattern does not compile. An empty pattern clears the search.
   */
  setPattern(source: string, options: PatternOptions = {}, direction: SearchDirection = 'forward'): void {
    let regex: RegExp | null = null;
    if (source !== '') {
      const caseSensitive = options.caseSensitive ?? hasUppercase(source);
      try {
        regex = new RegExp(source, caseSensitive ? 'g' : 'gi');
      } catch (err) {
        throw new InvalidPatternError(source, err instanceof Error ? err.message : String(err));
      }
    }
    this._source = source;
    this.regex = regex;
    this._scope = options.scope ?? 'all';
    this._direction = direction;
    this._matches = [];
    this._current = -1;
    this.scannedTree = null;
    this.scanned = 0;
  }

  clear(): void {
    this.setPattern('');
  }

  /** Rescan the whole tree. Keeps the current pointer on the same node where possible. */
  findAll(tree: ValueTree): readonly SearchMatch[] {
    const previous = this._current >= 0 ? this._matches[this._current] : null;
    const matches: SearchMatch[] = [];
    this.scanned = this.scan(tree, 0, matches);
    this.scannedTree = tree;
    this._matches = matches;
    this._current = previous
      ? matches.findIndex((m) => m.node === previous.node && m.field === previous.field && m.start === previous.start)
      : -1;
    return matches;
  }

  /**
   * Scan only the nodes appended since the last scan of `tree`. Nodes are
   * complete when appended, so earlier matches stay valid and new ones sort
   * after them. Falls back to a full rescan for another tree.
   */
  findNew(tree: ValueTree): readonly SearchMatch[] {
    if (tree !== this.scannedTree || tree.size < this.scanned) return this.findAll(tree);
    this.scanned = this.scan(tree, this.scanned, this._matches);
    return this._matches;
  }

  /** Collect matches on nodes `from..size-1`; returns the new scanned count. */
  private scan(tree: ValueTree, from: number, out: SearchMatch[]): number {
    const regex = this.regex;
    const end = tree.size;
    if (!regex) return end;
    for (let id = from; id < end; id++) {
      const node = tree.nodes[id];
      if (this._scope !== 'values' && node.keyRaw !== null) {
        collect(regex, node.keyRaw, node.id, 'key', out);
      }
      if (this._scope !== 'keys') {
        const text = valueText(node);
        if (text !== null) collect(regex, text, node.id, 'value', out);
      }
    }
    return end;
  }

  // ── Navigation ──

  /** Advance circularly. Returns null when there are no matches. */
  nextMatch(): SearchMatch | null {
    if (this._matches.length === 0) return null;
    this._current = (this._current + 1) % this._matches.length;
    return this._matches[this._current];
  }

  prevMatch(): SearchMatch | null {
    if (this._matches.length === 0) return null;
    this._current = this._current <= 0 ? this._matches.length - 1 : this._current - 1;
    return this._matches[this._current];
  }

  /** `n` when `reverse` is false, `N` when true. */
  repeat(reverse: boolean): SearchMatch | null {
    const forward = (this._direction === 'forward') !== reverse;
    return forward ? this.nextMatch() : this.prevMatch();
  }

  /**
   * Jump to the first match strictly after (forward) or before (backward)
   * node `anchor`, wrapping around the document.
   */
  seek(anchor: number, direction: SearchDirection = this._direction): SearchMatch | null {
    const n = this._matches.length;
    if (n === 0) return null;
    if (direction === 'forward') {
      const i = lowerBound(this._matches, anchor + 1);
      this._current = i < n ? i : 0;
    } else {
      const i = lowerBound(this._matches, anchor) - 1;
      this._current = i >= 0 ? i : n - 1;
    }
    return this._matches[this._current];
  }

  /** Matches on one node, for highlighting its row. */
  matchesOnNode(node: number): SearchMatch[] {
    const start = lowerBound(this._matches, node);
    const end = lowerBound(this._matches, node + 1);
    return this._matches.slice(start, end);
  }
}

/** Pattern that matches exactly one key, as raw text. */
export function keyPattern(keyRaw: string): string {
  return `^${keyRaw.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}$`;
}

/** Uppercase letters outside escapes; `\S` or `\W` alone do not count. */
function hasUppercase(source: string): boolean {
  return /[A-Z]/.test(source.replace(/\\./g, ''));
}

function valueText(node: TreeNode): string | null {
  if (isContainer(node)) return null;
  return node.kind === 'string' ? node.raw : node.text;
}

function collect(regex: RegExp, text: string, node: number, field: SearchMatch['field'], out: SearchMatch[]): void {
  regex.lastIndex = 0;
  let m: RegExpExecArray | null;
  while ((m = regex.exec(text)) !== null) {
    if (m[0].length === 0) {
      regex.lastIndex++;
      continue;
    }
    out.push({ node, field, start: m.index, end: m.index + m[0].length });
  }
}

/** First index whose match node is >= `node`. */
function lowerBound(matches: readonly SearchMatch[], node: number): number {
  let lo = 0;
  let hi = matches.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (matches[mid].node < node) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}
