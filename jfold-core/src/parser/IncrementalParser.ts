/**
 * Chunk-fed JSON parser that appends nodes to a ValueTree as soon as they
 * can be shown: containers when their opening delimiter is read, scalars
 * when their last character is read.
 *
 * Tokens may straddle chunk boundaries; an incomplete token stays in the
 * buffer until the next `push()` or `end()`. After a ParseError the tree
 * keeps every node appended before the failure and further input is
 * ignored.
 *
 * @module parser/IncrementalParser
 */

import { ParseError } from '../errors';
import { ROOT_ID } from '../tree';
import type { ContainerKind, InputMode, NodeKey, ValueTree } from '../tree';

// ── Types ──

type ObjectState = 'key-or-end' | 'key' | 'colon' | 'value' | 'comma-or-end';
type ArrayState = 'value-or-end' | 'value' | 'comma-or-end';

interface ObjectFrame {
  kind: 'object';
  id: number;
  state: ObjectState;
  pendingKey: NodeKey | null;
}

interface ArrayFrame {
  kind: 'array';
  id: number;
  state: ArrayState;
}

type Frame = ObjectFrame | ArrayFrame;

type Scanned<T> = { status: 'ok'; value: T; end: number } | { status: 'incomplete' };

// ── Constants ──

const NUMBER_RE = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/;
const NUMBER_CHARS = /[0-9+\-.eE]/;
const LITERALS: Record<string, 'bool' | 'null'> = { true: 'bool', false: 'bool', null: 'null' };

const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

// ── Parser ──

export class IncrementalParser {
  private buffer = '';
  private pos = 0;
  private line = 1;
  private column = 1;
  private readonly stack: Frame[] = [];
  private topLevelValues = 0;
  private started = false;
  private ended = false;
  private _error: ParseError | null = null;
  /** Resume point for a string literal that has not been closed yet. */
  private stringScanFrom = -1;
  private stringHasEscape = false;

  constructor(
    private readonly tree: ValueTree,
    private readonly mode: InputMode = tree.mode,
  ) {}

  get error(): ParseError | null {
    return this._error;
  }

  push(chunk: string): void {
    if (this._error || this.ended) return;
    if (!this.started) {
      this.started = true;
      if (chunk.charCodeAt(0) === 0xfeff) chunk = chunk.slice(1);
    }
    this.buffer += chunk;
    this.guard(() => this.drain());
    this.compact();
  }

  /** Flush the last token and verify the document is complete. */
  end(): void {
    if (this._error || this.ended) return;
    this.ended = true;
    this.guard(() => {
      this.drain();
      if (this.stack.length > 0) this.fail('Unexpected end of input');
      if (this.mode === 'json' && this.topLevelValues === 0) this.fail('Unexpected end of input');
    });
  }

  private guard(step: () => void): void {
    try {
      step();
    } catch (err) {
      if (err instanceof ParseError) this._error = err;
      throw err;
    }
  }

  private compact(): void {
    if (this.pos === 0) return;
    this.buffer = this.buffer.slice(this.pos);
    if (this.stringScanFrom >= 0) this.stringScanFrom -= this.pos;
    this.pos = 0;
  }

  // ── Token loop ──

  private drain(): void {
    for (;;) {
      this.skipWhitespace();
      if (this.pos >= this.buffer.length) return;
      const ch = this.buffer[this.pos];
      if (!this.step(ch)) return;
    }
  }

  /** Consume one token starting with `ch`. Returns false when more input is needed. */
  private step(ch: string): boolean {
    const frame = this.stack[this.stack.length - 1];

    if (!frame) {
      if (this.mode === 'json' && this.topLevelValues > 0) {
        this.fail(`Unexpected ${describe(ch)} after JSON value`);
      }
      return this.readValue(ROOT_ID, null);
    }

    if (frame.kind === 'object') return this.stepObject(frame, ch);
    return this.stepArray(frame, ch);
  }

  private stepObject(frame: ObjectFrame, ch: string): boolean {
    switch (frame.state) {
      case 'key-or-end':
      case 'key':
        if (ch === '}' && frame.state === 'key-or-end') {
          this.closeFrame();
          return true;
        }
        if (ch !== '"') this.fail(`Expected property name, found ${describe(ch)}`);
        return this.readKey(frame);
      case 'colon':
        if (ch !== ':') this.fail(`Expected ':' after property name, found ${describe(ch)}`);
        this.advance(1);
        frame.state = 'value';
        return true;
      case 'value':
        if (!this.readValue(frame.id, frame.pendingKey)) return false;
        frame.pendingKey = null;
        frame.state = 'comma-or-end';
        return true;
      case 'comma-or-end':
        if (ch === ',') {
          this.advance(1);
          frame.state = 'key';
          return true;
        }
        if (ch === '}') {
          this.closeFrame();
          return true;
        }
        return this.fail(`Expected ',' or '}', found ${describe(ch)}`);
    }
  }

  private stepArray(frame: ArrayFrame, ch: string): boolean {
    switch (frame.state) {
      case 'value-or-end':
      case 'value':
        if (ch === ']' && frame.state === 'value-or-end') {
          this.closeFrame();
          return true;
        }
        if (!this.readValue(frame.id, null)) return false;
        frame.state = 'comma-or-end';
        return true;
      case 'comma-or-end':
        if (ch === ',') {
          this.advance(1);
          frame.state = 'value';
          return true;
        }
        if (ch === ']') {
          this.closeFrame();
          return true;
        }
        return this.fail(`Expected ',' or ']', found ${describe(ch)}`);
    }
  }

  private closeFrame(): void {
    const frame = this.stack.pop();
    if (!frame) return;
    this.advance(1);
    this.tree.closeContainer(frame.id);
    if (this.stack.length === 0) this.topLevelValues++;
  }

  private readKey(frame: ObjectFrame): boolean {
    const scanned = this.scanString();
    if (scanned.status === 'incomplete') return false;
    frame.pendingKey = { key: scanned.value.value, keyRaw: scanned.value.raw };
    frame.state = 'colon';
    this.advance(scanned.end - this.pos);
    return true;
  }

  /**
   * Read one value under `parent`. Returns false, consuming nothing, when
   * the token runs past the end of the buffer.
   */
  private readValue(parent: number, key: NodeKey | null): boolean {
    const ch = this.buffer[this.pos];

    if (ch === '{' || ch === '[') {
      const kind: ContainerKind = ch === '{' ? 'object' : 'array';
      const id = this.tree.appendContainer(parent, key, kind);
      this.advance(1);
      this.stack.push(kind === 'object'
        ? { kind, id, state: 'key-or-end', pendingKey: null }
        : { kind, id, state: 'value-or-end' });
      return true;
    }

    if (ch === '"') {
      const scanned = this.scanString();
      if (scanned.status === 'incomplete') return false;
      this.tree.appendString(parent, key, scanned.value.raw, scanned.value.value);
      this.advance(scanned.end - this.pos);
      this.valueDone(parent);
      return true;
    }

    if (ch === '-' || (ch >= '0' && ch <= '9')) {
      const end = this.scanRun(NUMBER_CHARS);
      if (end === null) return false;
      const text = this.buffer.slice(this.pos, end);
      if (!NUMBER_RE.test(text)) this.fail(`Invalid number '${text}'`);
      this.tree.appendScalar(parent, key, 'number', text);
      this.advance(end - this.pos);
      this.valueDone(parent);
      return true;
    }

    if (ch >= 'a' && ch <= 'z') {
      const end = this.scanRun(/[a-z]/);
      if (end === null) return false;
      const text = this.buffer.slice(this.pos, end);
      const kind = LITERALS[text];
      if (!kind) this.fail(`Unexpected token '${text}'`);
      this.tree.appendScalar(parent, key, kind, text);
      this.advance(end - this.pos);
      this.valueDone(parent);
      return true;
    }

    return this.fail(`Unexpected ${describe(ch)}`);
  }

  private valueDone(parent: number): void {
    if (parent === ROOT_ID) this.topLevelValues++;
  }

  // ── Scanners ──

  private skipWhitespace(): void {
    while (this.pos < this.buffer.length) {
      const ch = this.buffer[this.pos];
      if (ch !== ' ' && ch !== '\t' && ch !== '\n' && ch !== '\r') return;
      this.advance(1);
    }
  }

  /**
   * End of a run of `chars` starting at `pos`, or null when the run reaches
   * the end of the buffer and more input could extend it.
   */
  private scanRun(chars: RegExp): number | null {
    let end = this.pos;
    while (end < this.buffer.length && chars.test(this.buffer[end])) end++;
    if (end === this.buffer.length && !this.ended) return null;
    return end;
  }

  private scanString(): Scanned<{ raw: string; value: string }> {
    const start = this.pos;
    const resuming = this.stringScanFrom > start;
    let i = resuming ? this.stringScanFrom : start + 1;
    let hasEscape = resuming && this.stringHasEscape;

    while (i < this.buffer.length) {
      const code = this.buffer.charCodeAt(i);
      if (code === 0x22) {
        const raw = this.buffer.slice(start + 1, i);
        this.stringScanFrom = -1;
        const value = hasEscape ? this.unescape(raw, start + 1) : raw;
        return { status: 'ok', value: { raw, value }, end: i + 1 };
      }
      if (code === 0x5c) {
        hasEscape = true;
        if (i + 1 >= this.buffer.length) break;
        i += 2;
        continue;
      }
      if (code < 0x20) {
        this.advance(i - this.pos);
        this.fail('Unescaped control character in string');
      }
      i++;
    }

    if (this.ended) {
      this.fail('Unterminated string');
    }
    this.stringScanFrom = i;
    this.stringHasEscape = hasEscape;
    return { status: 'incomplete' };
  }

  private unescape(raw: string, offset: number): string {
    let out = '';
    let i = 0;
    while (i < raw.length) {
      const ch = raw[i];
      if (ch !== '\\') {
        out += ch;
        i++;
        continue;
      }
      const next = raw[i + 1];
      const simple = SIMPLE_ESCAPES[next];
      if (simple !== undefined) {
        out += simple;
        i += 2;
        continue;
      }
      if (next === 'u') {
        const hex = raw.slice(i + 2, i + 6);
        if (/^[0-9a-fA-F]{4}$/.test(hex)) {
          out += String.fromCharCode(parseInt(hex, 16));
          i += 6;
          continue;
        }
      }
      this.advance(offset + i - this.pos);
      return this.fail(`Invalid escape sequence '\\${next}'`);
    }
    return out;
  }

  private advance(count: number): void {
    const end = this.pos + count;
    for (let i = this.pos; i < end; i++) {
      if (this.buffer.charCodeAt(i) === 0x0a) {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
    }
    this.pos = end;
  }

  private fail(reason: string): never {
    throw new ParseError(reason, this.line, this.column);
  }
}

function describe(ch: string): string {
  return `'${ch}'`;
}
