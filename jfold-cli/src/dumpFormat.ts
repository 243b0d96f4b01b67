/**
 * Plain or colored text rendering of a whole document for `jfold dump`.
 */

import { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';
import { LineFlattener, lineSegments } from 'jfold-core';
import type { ValueTree, ViewMode } from 'jfold-core';
import { styleRow } from './pager/rowStyle';
import type { StyledSpan } from './pager/rowStyle';

export interface DumpFormatOptions {
  mode: ViewMode;
  color: boolean;
}

/** Every visible row, honoring the tree's collapse state. */
export function* formatDump(tree: ValueTree, options: DumpFormatOptions): Generator<string> {
  const chalk = new Chalk({ level: options.color ? 1 : 0 });
  const flattener = new LineFlattener(tree, options.mode);
  for (let line = flattener.lineAt(0); line; line = flattener.nextLine(line)) {
    const spans = styleRow(lineSegments(tree, line, options.mode), { mode: options.mode });
    yield spans.map((span) => paint(chalk, span)).join('');
  }
}

function paint(chalk: ChalkInstance, span: StyledSpan): string {
  const { color, bold, dimColor } = span.style;
  let style = chalk;
  if (color) style = style[color];
  if (bold) style = style.bold;
  if (dimColor) style = style.dim;
  return style === chalk ? span.text : style(span.text);
}
