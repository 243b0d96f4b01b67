import { describe, it, expect } from 'vitest';
import { SearchEngine, keyPattern } from './SearchEngine';
import { InvalidPatternError } from '../errors';
import { IncrementalParser, parseDocument } from '../parser';
import { ValueTree } from '../tree';

// ids: 1 {}, 2 name, 3 list, 4 "Needle in hay", 5 "none", 6 needle
const DOC = '{"name":"needle","list":["Needle in hay","none"],"needle":1}';

function nodesOf(engine: SearchEngine): number[] {
  return engine.matches.map((m) => m.node);
}

describe('SearchEngine', () => {
  const tree = parseDocument(DOC);

  describe('findAll', () => {
    it('is case-insensitive for lowercase patterns', () => {
      const engine = new SearchEngine();
      engine.setPattern('needle');
      engine.findAll(tree);
      expect(engine.matches).toEqual([
        { node: 2, field: 'value', start: 0, end: 6 },
        { node: 4, field: 'value', start: 0, end: 6 },
        { node: 6, field: 'key', start: 0, end: 6 },
      ]);
    });

    it('turns case-sensitive when the pattern has an uppercase letter', () => {
      const engine = new SearchEngine();
      engine.setPattern('Needle');
      engine.findAll(tree);
      expect(nodesOf(engine)).toEqual([4]);
      engine.setPattern('Needle', { caseSensitive: false });
      engine.findAll(tree);
      expect(nodesOf(engine)).toEqual([2, 4, 6]);
    });

    it('ignores the letter of an escape when choosing smart case', () => {
      const engine = new SearchEngine();
      engine.setPattern('n\\S+');
      engine.findAll(tree);
      // name (key), needle, Needle, none, needle (key)
      expect(nodesOf(engine)).toEqual([2, 2, 4, 5, 6]);
    });

    it('restricts matches to keys or values', () => {
      const engine = new SearchEngine();
      engine.setPattern('needle', { scope: 'keys' });
      engine.findAll(tree);
      expect(nodesOf(engine)).toEqual([6]);
      engine.setPattern('n', { scope: 'values' });
      engine.findAll(tree);
      expect(nodesOf(engine)).toEqual([2, 4, 4, 5, 5]);
    });

    it('orders a key match before value matches of the same node', () => {
      const engine = new SearchEngine();
      engine.setPattern('ab');
      engine.findAll(parseDocument('{"ab":"xab"}'));
      expect(engine.matches).toEqual([
        { node: 2, field: 'key', start: 0, end: 2 },
        { node: 2, field: 'value', start: 1, end: 3 },
      ]);
    });

    it('matches duplicate keys independently', () => {
      const engine = new SearchEngine();
      engine.setPattern('k');
      engine.findAll(parseDocument('{"k":1,"k":2}'));
      expect(nodesOf(engine)).toEqual([2, 3]);
    });

    it('skips zero-length matches', () => {
      const engine = new SearchEngine();
      engine.setPattern('x*');
      engine.findAll(parseDocument('["abc","axxb"]'));
      expect(engine.matches).toEqual([{ node: 3, field: 'value', start: 1, end: 3 }]);
    });

    it('matches numbers and literals by their source text', () => {
      const engine = new SearchEngine();
      engine.setPattern('^1\\.50$');
      engine.findAll(parseDocument('[1.50, 1.5, true]'));
      expect(nodesOf(engine)).toEqual([2]);
    });
  });

  describe('setPattern', () => {
    it('throws on a malformed pattern and keeps prior state', () => {
      const engine = new SearchEngine();
      engine.setPattern('needle');
      engine.findAll(tree);
      engine.nextMatch();
      expect(() => engine.setPattern('(')).toThrow(InvalidPatternError);
      expect(engine.source).toBe('needle');
      expect(engine.matches).toHaveLength(3);
      expect(engine.current).toBe(0);
    });

    it('treats an empty pattern as no search', () => {
      const engine = new SearchEngine();
      engine.setPattern('');
      engine.findAll(tree);
      expect(engine.active).toBe(false);
      expect(engine.nextMatch()).toBeNull();
      expect(engine.seek(1)).toBeNull();
    });
  });

  describe('navigation', () => {
    it('wraps around in both directions', () => {
      const engine = new SearchEngine();
      engine.setPattern('needle');
      engine.findAll(tree);
      const first = engine.nextMatch();
      engine.nextMatch();
      engine.nextMatch();
      expect(engine.nextMatch()).toEqual(first);
      expect(engine.prevMatch()?.node).toBe(6);
    });

    it('seeks from an anchor node', () => {
      const engine = new SearchEngine();
      engine.setPattern('needle');
      engine.findAll(tree);
      expect(engine.seek(4, 'forward')?.node).toBe(6);
      expect(engine.seek(4, 'backward')?.node).toBe(2);
      expect(engine.seek(6, 'forward')?.node).toBe(2);
      expect(engine.seek(2, 'backward')?.node).toBe(6);
    });

    it('repeats in the search direction or against it', () => {
      const engine = new SearchEngine();
      engine.setPattern('needle', {}, 'backward');
      engine.findAll(tree);
      engine.seek(4);
      expect(engine.current).toBe(0);
      expect(engine.repeat(false)?.node).toBe(6);
      expect(engine.repeat(true)?.node).toBe(2);
    });

    it('keeps the current match across a rescan', () => {
      const engine = new SearchEngine();
      engine.setPattern('needle');
      engine.findAll(tree);
      engine.seek(3, 'forward');
      engine.findAll(tree);
      expect(engine.current).toBe(1);
    });

    it('scans only appended nodes while the tree grows', () => {
      const growing = new ValueTree();
      const parser = new IncrementalParser(growing);
      const engine = new SearchEngine();
      engine.setPattern('ab');
      parser.push('["ab",');
      engine.findNew(growing);
      expect(nodesOf(engine)).toEqual([2]);
      engine.nextMatch();
      parser.push('"x","cab"]');
      parser.end();
      engine.findNew(growing);
      expect(nodesOf(engine)).toEqual([2, 4]);
      expect(engine.matches[1]).toEqual({ node: 4, field: 'value', start: 1, end: 3 });
      expect(engine.current).toBe(0);
    });

    it('lists matches on one node', () => {
      const engine = new SearchEngine();
      engine.setPattern('n');
      engine.findAll(tree);
      expect(engine.matchesOnNode(5).map((m) => m.start)).toEqual([0, 2]);
      expect(engine.matchesOnNode(3)).toEqual([]);
    });
  });

  it('builds exact key patterns', () => {
    expect(keyPattern('a.b')).toBe('^a\\.b$');
    expect(new RegExp(keyPattern('x(1)')).test('x(1)')).toBe(true);
  });
});
