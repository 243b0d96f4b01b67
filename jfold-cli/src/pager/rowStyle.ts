/**
 * Turns a row's token segments into styled spans: token colors, search
 * match highlights, cursor highlight and horizontal clipping.
 *
 * Shared by the Ink document pane and the colored `dump` output.
 */

import type { SearchMatch, Segment, TokenKind, ViewMode } from 'jfold-core';

export type SpanColor = 'black' | 'blue' | 'cyan' | 'gray' | 'green' | 'magenta' | 'yellow';

export interface SpanStyle {
  color?: SpanColor;
  backgroundColor?: SpanColor;
  bold?: boolean;
  dimColor?: boolean;
  inverse?: boolean;
}

export interface StyledSpan {
  text: string;
  style: SpanStyle;
}

export interface RowOptions {
  mode: ViewMode;
  focused?: boolean;
  /** Matches on this row's node. */
  matches?: readonly SearchMatch[];
  current?: SearchMatch | null;
  /** First visible column. */
  left?: number;
  /** Visible columns; the focused row is padded to this width. */
  width?: number;
}

export const TOKEN_STYLES: Record<TokenKind, SpanStyle> = {
  indent: {},
  key: { color: 'blue' },
  label: { color: 'cyan' },
  punct: { dimColor: true },
  string: { color: 'green' },
  number: { color: 'magenta' },
  bool: { color: 'yellow' },
  null: { color: 'gray' },
  preview: { color: 'gray' },
};

const MATCH_STYLE: SpanStyle = { color: 'black', backgroundColor: 'yellow', dimColor: false };
const CURRENT_MATCH_STYLE: SpanStyle = { color: 'black', backgroundColor: 'cyan', dimColor: false };

export function styleRow(segments: readonly Segment[], options: RowOptions): StyledSpan[] {
  const spans: StyledSpan[] = [];
  const matches = options.matches ?? [];
  for (const segment of segments) {
    const base = tokenStyle(segment.token, options.mode);
    const field = segment.field;
    const ranges = field ? matches.filter((m) => m.field === field) : [];
    pushHighlighted(spans, segment.text, base, ranges, options.current ?? null);
  }

  const left = options.left ?? 0;
  const width = options.width ?? Number.POSITIVE_INFINITY;
  const clipped = clip(spans, left, width);
  if (!options.focused) return clipped;

  const focused = clipped.map((s) => ({ text: s.text, style: { ...s.style, inverse: true } }));
  const used = clipped.reduce((n, s) => n + s.text.length, 0);
  if (Number.isFinite(width) && used < width) {
    focused.push({ text: ' '.repeat(width - used), style: { inverse: true } });
  }
  return focused;
}

function tokenStyle(token: TokenKind, mode: ViewMode): SpanStyle {
  const style = TOKEN_STYLES[token];
  return token === 'key' && mode === 'line' ? { ...style, bold: true } : style;
}

function pushHighlighted(
  out: StyledSpan[],
  text: string,
  base: SpanStyle,
  ranges: readonly SearchMatch[],
  current: SearchMatch | null,
): void {
  let pos = 0;
  const sorted = [...ranges].sort((a, b) => a.start - b.start);
  for (const range of sorted) {
    const start = Math.max(pos, Math.min(range.start, text.length));
    const end = Math.min(range.end, text.length);
    if (end <= start) continue;
    if (start > pos) out.push({ text: text.slice(pos, start), style: base });
    const highlight = isSameMatch(range, current) ? CURRENT_MATCH_STYLE : MATCH_STYLE;
    out.push({ text: text.slice(start, end), style: { ...base, ...highlight } });
    pos = end;
  }
  if (pos < text.length) out.push({ text: text.slice(pos), style: base });
}

function isSameMatch(a: SearchMatch, b: SearchMatch | null): boolean {
  return b !== null && a.node === b.node && a.field === b.field && a.start === b.start;
}

function clip(spans: readonly StyledSpan[], left: number, width: number): StyledSpan[] {
  const right = left + width;
  const out: StyledSpan[] = [];
  let col = 0;
  for (const span of spans) {
    const start = col;
    const end = col + span.text.length;
    col = end;
    const from = Math.max(start, left);
    const to = Math.min(end, right);
    if (to <= from) continue;
    out.push({ text: span.text.slice(from - start, to - start), style: span.style });
  }
  return out;
}
