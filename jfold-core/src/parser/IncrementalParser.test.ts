import { describe, it, expect } from 'vitest';
import { IncrementalParser } from './IncrementalParser';
import { parseDocument } from './parseDocument';
import { ParseError } from '../errors';
import { ValueTree, isContainer } from '../tree';
import type { TreeNode } from '../tree';

function shape(node: TreeNode): string {
  const key = node.key === null ? '' : `${node.key}=`;
  switch (node.kind) {
    case 'string': return `${key}s:${node.raw}`;
    case 'object':
    case 'array': return `${key}${node.kind}[${node.children.length}]`;
    default: return `${key}${node.kind}:${node.text}`;
  }
}

function shapes(tree: ValueTree): string[] {
  return tree.nodes.slice(1).map(shape);
}

/** Rows/closers recomputed from scratch, for comparison with the maintained counts. */
function freshCounts(tree: ValueTree, id: number): { rows: number; closers: number } {
  const node = tree.node(id);
  if (!isContainer(node)) return { rows: 1, closers: 0 };
  let rows = 0;
  let closers = 0;
  for (const child of node.children) {
    const c = freshCounts(tree, child);
    rows += c.rows;
    closers += c.closers;
  }
  if (node.synthetic) return { rows, closers };
  if (node.collapsed || node.children.length === 0) return { rows: 1, closers: 0 };
  return { rows: rows + 1, closers: closers + 1 };
}

function parseError(text: string, mode: 'json' | 'jsonl' = 'json'): ParseError {
  try {
    parseDocument(text, { mode });
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error('expected a ParseError');
}

describe('parseDocument', () => {
  it('builds nodes in document order', () => {
    const tree = parseDocument('{"a":1,"b":[1,2,3]}');
    expect(shapes(tree)).toEqual([
      'object[2]', 'a=number:1', 'b=array[3]', 'number:1', 'number:2', 'number:3',
    ]);
    expect(tree.visibleLineCount('line')).toBe(8);
    expect(tree.visibleLineCount('data')).toBe(6);
    expect(tree.growing).toBe(false);
  });

  it('keeps number source text verbatim', () => {
    const tree = parseDocument('[1.50e3, -0, 10E-2]');
    expect(shapes(tree)).toEqual(['array[3]', 'number:1.50e3', 'number:-0', 'number:10E-2']);
  });

  it('keeps duplicate keys in order', () => {
    const tree = parseDocument('{"k":1,"k":2}');
    expect(shapes(tree)).toEqual(['object[2]', 'k=number:1', 'k=number:2']);
  });

  it('stores raw and unescaped string forms', () => {
    const tree = parseDocument('["a\\nb", "\\u00e9", "\\ud83d\\ude00", "q\\"t"]');
    const values = tree.nodes.slice(2).map((n) => (n.kind === 'string' ? [n.raw, n.value] : null));
    expect(values).toEqual([
      ['a\\nb', 'a\nb'],
      ['\\u00e9', 'é'],
      ['\\ud83d\\ude00', '😀'],
      ['q\\"t', 'q"t'],
    ]);
  });

  it('unescapes keys but keeps their raw form', () => {
    const tree = parseDocument('{"a\\tb": null}');
    const node = tree.node(2);
    expect(node.key).toBe('a\tb');
    expect(node.keyRaw).toBe('a\\tb');
  });

  it('skips a leading byte order mark', () => {
    expect(shapes(parseDocument('\uFEFF[true]'))).toEqual(['array[1]', 'bool:true']);
  });

  it('reads line-delimited values as separate top-level blocks', () => {
    const tree = parseDocument('{"x":1}\n{"y":2}\n', { mode: 'jsonl' });
    expect(tree.root.children).toEqual([1, 3]);
    expect(shapes(tree)).toEqual(['object[1]', 'x=number:1', 'object[1]', 'y=number:2']);
    expect(tree.visibleLineCount('line')).toBe(6);
  });

  it('accepts an empty line-delimited stream', () => {
    const tree = parseDocument('\n\n', { mode: 'jsonl' });
    expect(tree.hasContent).toBe(false);
    expect(tree.visibleLineCount('line')).toBe(0);
  });

  it('starts containers collapsed at the configured depth', () => {
    const tree = parseDocument('{"a":{"b":1},"c":[2]}', { collapseDepth: 1 });
    expect(tree.container(1).collapsed).toBe(false);
    expect(tree.container(2).collapsed).toBe(true);
    expect(tree.container(4).collapsed).toBe(true);
    expect(tree.visibleLineCount('line')).toBe(4);
  });
});

describe('parse errors', () => {
  it('reports a trailing comma in an object', () => {
    const err = parseError('{"a":1,}');
    expect(err.message).toBe("Expected property name, found '}' at line 1, column 8");
  });

  it('reports trailing content after a JSON value', () => {
    const err = parseError('{} x');
    expect(err.reason).toBe("Unexpected 'x' after JSON value");
    expect(err.column).toBe(4);
  });

  it('reports empty input', () => {
    expect(parseError('').message).toBe('Unexpected end of input at line 1, column 1');
  });

  it('tracks lines and columns across newlines', () => {
    const err = parseError('{\n  "a": tru\n}');
    expect(err.reason).toBe("Unexpected token 'tru'");
    expect([err.line, err.column]).toEqual([2, 8]);
  });

  it('reports an unterminated string at its opening quote', () => {
    const err = parseError('{"a": "abc');
    expect(err.reason).toBe('Unterminated string');
    expect(err.column).toBe(7);
  });

  it('rejects numbers outside the JSON grammar', () => {
    expect(parseError('[01]').reason).toBe("Invalid number '01'");
  });

  it('rejects raw control characters in strings', () => {
    const err = parseError('["a\tb"]');
    expect(err.reason).toBe('Unescaped control character in string');
    expect(err.column).toBe(4);
  });

  it('rejects unknown escapes', () => {
    expect(parseError('["\\x"]').reason).toBe("Invalid escape sequence '\\x'");
  });

  it('reports an unclosed container', () => {
    expect(parseError('[1, [2').reason).toBe('Unexpected end of input');
  });
});

describe('IncrementalParser', () => {
  const doc = '{"s":"x\\"y","n":-12.5e+3,"t":true,"arr":[null,{"deep":[]}],"u":"\\u0041"}';

  it('produces the same tree whatever the chunk boundaries', () => {
    const expected = shapes(parseDocument(doc));
    for (const size of [1, 2, 3, 7]) {
      const tree = new ValueTree();
      const parser = new IncrementalParser(tree);
      for (let i = 0; i < doc.length; i += size) parser.push(doc.slice(i, i + size));
      parser.end();
      expect(shapes(tree)).toEqual(expected);
    }
  });

  it('keeps counts consistent while the tree grows', () => {
    const tree = new ValueTree({ collapseDepth: 2 });
    const parser = new IncrementalParser(tree);
    for (const ch of doc) {
      parser.push(ch);
      for (const node of tree.nodes) {
        if (!isContainer(node)) continue;
        const fresh = freshCounts(tree, node.id);
        expect([node.rows, node.closers]).toEqual([fresh.rows, fresh.closers]);
      }
    }
    parser.end();
  });

  it('shows containers as soon as they open', () => {
    const tree = new ValueTree();
    const parser = new IncrementalParser(tree);
    parser.push('{"a": [');
    expect(shapes(tree)).toEqual(['object[1]', 'a=array[0]']);
    expect(tree.container(2).closed).toBe(false);
    parser.push('1');
    expect(tree.size).toBe(3);
    parser.push(']}');
    expect(tree.size).toBe(4);
    expect(tree.container(2).closed).toBe(true);
  });

  it('keeps the partial tree and ignores input after an error', () => {
    const tree = new ValueTree();
    const parser = new IncrementalParser(tree);
    expect(() => parser.push('[1, 2, ]')).toThrow(ParseError);
    expect(tree.size).toBe(4);
    expect(parser.error?.reason).toBe("Unexpected ']'");
    parser.push(', 3]');
    parser.end();
    expect(tree.size).toBe(4);
  });
});
