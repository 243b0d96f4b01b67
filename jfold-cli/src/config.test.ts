import { describe, it, expect } from 'vitest';
import { DEFAULT_SCROLLOFF, UsageError, resolveConfig, resolveDumpConfig } from './config';

describe('resolveConfig', () => {
  it('applies defaults for a bare invocation', () => {
    expect(resolveConfig(undefined, { mouse: true })).toEqual({
      file: null,
      inputMode: 'json',
      viewMode: 'line',
      scrolloff: DEFAULT_SCROLLOFF,
      collapseDepth: null,
      caseSensitive: undefined,
      mouse: true,
    });
  });

  it('treats "-" as stdin', () => {
    expect(resolveConfig('-', {}).file).toBeNull();
  });

  it('infers jsonl from the file extension', () => {
    expect(resolveConfig('logs/app.JSONL', {}).inputMode).toBe('jsonl');
    expect(resolveConfig('events.ndjson', {}).inputMode).toBe('jsonl');
    expect(resolveConfig('data.json', {}).inputMode).toBe('json');
  });

  it('lets --mode override the extension', () => {
    expect(resolveConfig('events.ndjson', { mode: 'json' }).inputMode).toBe('json');
  });

  it('parses numeric flags and switches', () => {
    const config = resolveConfig('a.json', {
      scrolloff: '0',
      collapseDepth: '2',
      view: 'data',
      caseSensitive: true,
      mouse: false,
    });
    expect(config).toMatchObject({ scrolloff: 0, collapseDepth: 2, viewMode: 'data', caseSensitive: true, mouse: false });
  });

  it('rejects bad values as usage errors', () => {
    expect(() => resolveConfig(undefined, { scrolloff: '-1' }))
      .toThrow('--scrolloff must be a non-negative integer, got "-1"');
    expect(() => resolveConfig(undefined, { collapseDepth: '1.5' })).toThrow(UsageError);
    expect(() => resolveConfig(undefined, { mode: 'yaml' })).toThrow('--mode must be "json" or "jsonl", got "yaml"');
    expect(() => resolveConfig(undefined, { view: 'tree' })).toThrow('--view must be "line" or "data", got "tree"');
  });
});

describe('resolveDumpConfig', () => {
  it('colors only when stdout is a terminal and --no-color is absent', () => {
    expect(resolveDumpConfig('a.json', {}, true).color).toBe(true);
    expect(resolveDumpConfig('a.json', {}, false).color).toBe(false);
    expect(resolveDumpConfig('a.json', { color: false }, true).color).toBe(false);
  });

  it('parses --depth', () => {
    expect(resolveDumpConfig(undefined, { depth: '1' }, false)).toEqual({
      file: null,
      inputMode: 'json',
      viewMode: 'line',
      depth: 1,
      color: false,
    });
  });
});
