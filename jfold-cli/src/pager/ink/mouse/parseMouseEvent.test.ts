import { describe, it, expect } from 'vitest';
import { isMouseInput, parseMouseEvents } from './parseMouseEvent';

describe('parseMouseEvents', () => {
  it('parses a left press with 0-based coordinates', () => {
    expect(parseMouseEvents('\x1b[<0;6;11M')).toEqual([
      { type: 'press', button: 'left', x: 5, y: 10 },
    ]);
  });

  it('parses a release', () => {
    expect(parseMouseEvents('\x1b[<2;1;1m')).toEqual([
      { type: 'release', button: 'right', x: 0, y: 0 },
    ]);
  });

  it('parses wheel events, ignoring modifier bits', () => {
    expect(parseMouseEvents('\x1b[<64;15;5M\x1b[<81;15;5M')).toEqual([
      { type: 'scroll', button: 'none', x: 14, y: 4, scrollDirection: 'up' },
      { type: 'scroll', button: 'none', x: 14, y: 4, scrollDirection: 'down' },
    ]);
  });

  it('accepts reports with the escape already stripped', () => {
    expect(parseMouseEvents('[<1;3;4M')).toEqual([
      { type: 'press', button: 'middle', x: 2, y: 3 },
    ]);
  });

  it('skips motion reports and plain input', () => {
    expect(parseMouseEvents('\x1b[<35;3;4M')).toEqual([]);
    expect(parseMouseEvents(Buffer.from('hello'))).toEqual([]);
    expect(parseMouseEvents('\x1b[A')).toEqual([]);
  });
});

describe('isMouseInput', () => {
  it('recognises input made only of mouse reports', () => {
    expect(isMouseInput('[<64;1;1M[<64;1;1M')).toBe(true);
    expect(isMouseInput('[<64;1;1Mj')).toBe(false);
    expect(isMouseInput('')).toBe(false);
  });
});
