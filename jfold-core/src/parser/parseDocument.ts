import { ValueTree } from '../tree';
import type { ValueTreeOptions } from '../tree';
import { IncrementalParser } from './IncrementalParser';

/** Parse a whole document in one go. Throws ParseError on malformed input. */
export function parseDocument(text: string, options: ValueTreeOptions = {}): ValueTree {
  const tree = new ValueTree(options);
  const parser = new IncrementalParser(tree);
  parser.push(text);
  parser.end();
  tree.finish();
  return tree;
}
