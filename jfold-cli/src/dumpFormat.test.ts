import { describe, it, expect } from 'vitest';
import { parseDocument } from 'jfold-core';
import { formatDump } from './dumpFormat';

describe('formatDump', () => {
  it('prints plain rows', () => {
    const tree = parseDocument('{"a":1,"b":[true,null]}');
    expect([...formatDump(tree, { mode: 'line', color: false })]).toEqual([
      '{',
      '  "a": 1,',
      '  "b": [',
      '    true,',
      '    null',
      '  ]',
      '}',
    ]);
  });

  it('honors collapse depth and data mode', () => {
    const tree = parseDocument('{"a":1,"b":[true,null]}', { collapseDepth: 1 });
    expect([...formatDump(tree, { mode: 'data', color: false })]).toEqual([
      '{',
      '  a: 1',
      '  b: [...] (2 items)',
    ]);
  });

  it('colors tokens', () => {
    const tree = parseDocument('[1]');
    expect([...formatDump(tree, { mode: 'line', color: true })]).toEqual([
      '\u001b[2m[\u001b[22m',
      '  \u001b[35m1\u001b[39m',
      '\u001b[2m]\u001b[22m',
    ]);
  });
});
