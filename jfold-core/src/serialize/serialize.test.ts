import { describe, it, expect } from 'vitest';
import { pathOf, serializeValue } from './serialize';
import { parseDocument } from '../parser';

describe('serializeValue', () => {
  const tree = parseDocument('{"a":1.50,"b":[true,null,"x\\ny"],"c":{}}');

  it('pretty-prints with source number text and escapes', () => {
    expect(serializeValue(tree, 1)).toBe(
      '{\n  "a": 1.50,\n  "b": [\n    true,\n    null,\n    "x\\ny"\n  ],\n  "c": {}\n}',
    );
  });

  it('writes compact output at indent 0', () => {
    expect(serializeValue(tree, 1, { indent: 0 })).toBe('{"a":1.50,"b":[true,null,"x\\ny"],"c":{}}');
  });

  it('serializes a scalar on its own', () => {
    expect(serializeValue(tree, 2)).toBe('1.50');
    expect(serializeValue(tree, 6)).toBe('"x\\ny"');
  });

  it('keeps duplicate keys', () => {
    expect(serializeValue(parseDocument('{"k":1,"k":2}'), 1, { indent: 0 })).toBe('{"k":1,"k":2}');
  });
});

describe('pathOf', () => {
  it('builds jq-style paths', () => {
    const tree = parseDocument('{"a":{"b":[10,{"weird key":1}]}}');
    expect(pathOf(tree, 1)).toBe('.');
    expect(pathOf(tree, 2)).toBe('.a');
    expect(pathOf(tree, 4)).toBe('.a.b[0]');
    expect(pathOf(tree, 6)).toBe('.a.b[1]["weird key"]');
  });

  it('prefixes a top-level array index with a dot', () => {
    expect(pathOf(parseDocument('[[1]]'), 3)).toBe('.[0][0]');
  });

  it('prefixes line-delimited values with their position', () => {
    const tree = parseDocument('{"x":1}\n{"y":[2]}\n', { mode: 'jsonl' });
    expect(pathOf(tree, 1)).toBe('[0]');
    expect(pathOf(tree, 4)).toBe('[1].y');
    expect(pathOf(tree, 5)).toBe('[1].y[0]');
  });
});
