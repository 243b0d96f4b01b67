/**
 * Chord grammar: an optional count, then a key sequence from the binding
 * table. The table is compiled into a trie; each key either extends the
 * pending prefix, completes a command, or matches nothing.
 *
 * Pending-input policy:
 * - `0` starts nothing; it only extends a count already begun.
 * - A count followed by a key with no binding is discarded together with
 *   that key; nothing runs.
 * - Escape drops any pending count or prefix.
 *
 * `/` and `?` switch to prompt mode, where keys edit the pattern until
 * Enter confirms or Escape cancels.
 *
 * @module input/InputStateMachine
 */

import { InvalidChordError } from '../errors';
import { DEFAULT_BINDINGS, chordKeys } from './keymap';
import type { Binding, CommandName } from './keymap';
import type { SearchDirection } from '../search';

export type InputOutcome =
  | { type: 'pending'; display: string }
  | { type: 'command'; command: CommandName; count: number | null }
  | { type: 'invalid'; error: InvalidChordError }
  | { type: 'reset' }
  | { type: 'prompt'; text: string; direction: SearchDirection }
  | { type: 'search'; pattern: string; direction: SearchDirection }
  | { type: 'search-cancelled' };

export type KeyMode = 'normal' | 'prompt';

interface TrieNode {
  command: CommandName | null;
  children: Map<string, TrieNode>;
}

const MAX_COUNT_DIGITS = 6;

export class InputStateMachine {
  private readonly root: TrieNode;
  private node: TrieNode;
  private count = '';
  private prefix: string[] = [];
  private prompt: { text: string; direction: SearchDirection } | null = null;

  constructor(private readonly bindings: readonly Binding[] = DEFAULT_BINDINGS) {
    this.root = buildTrie(bindings);
    this.node = this.root;
  }

  get mode(): KeyMode {
    return this.prompt ? 'prompt' : 'normal';
  }

  /** Count and chord prefix typed so far, e.g. `12z`. */
  get pending(): string {
    return this.count + this.prefix.join('');
  }

  get promptText(): string | null {
    return this.prompt?.text ?? null;
  }

  listBindings(): readonly Binding[] {
    return this.bindings;
  }

  reset(): void {
    this.count = '';
    this.prefix = [];
    this.node = this.root;
    this.prompt = null;
  }

  feed(key: string): InputOutcome {
    return this.prompt ? this.feedPrompt(this.prompt, key) : this.feedNormal(key);
  }

  private feedNormal(key: string): InputOutcome {
    if (key === 'escape') {
      this.reset();
      return { type: 'reset' };
    }

    if (this.prefix.length === 0 && /^[0-9]$/.test(key) && (key !== '0' || this.count !== '')) {
      if (this.count.length < MAX_COUNT_DIGITS) this.count += key;
      return { type: 'pending', display: this.pending };
    }

    const next = this.node.children.get(key);
    if (!next) {
      const keys = [...this.count.split(''), ...this.prefix, key];
      this.reset();
      return { type: 'invalid', error: new InvalidChordError(keys) };
    }

    if (next.command === null) {
      this.prefix.push(key);
      this.node = next;
      return { type: 'pending', display: this.pending };
    }

    const command = next.command;
    const count = this.count === '' ? null : Number.parseInt(this.count, 10);
    this.reset();

    if (command === 'search-forward' || command === 'search-backward') {
      this.prompt = { text: '', direction: command === 'search-forward' ? 'forward' : 'backward' };
      return { type: 'prompt', text: '', direction: this.prompt.direction };
    }
    return { type: 'command', command, count };
  }

  private feedPrompt(prompt: { text: string; direction: SearchDirection }, key: string): InputOutcome {
    switch (key) {
      case 'enter':
        this.prompt = null;
        return { type: 'search', pattern: prompt.text, direction: prompt.direction };
      case 'escape':
        this.prompt = null;
        return { type: 'search-cancelled' };
      case 'backspace':
        if (prompt.text === '') {
          this.prompt = null;
          return { type: 'search-cancelled' };
        }
        prompt.text = [...prompt.text].slice(0, -1).join('');
        break;
      case 'space':
        prompt.text += ' ';
        break;
      default:
        if ([...key].length === 1) prompt.text += key;
        break;
    }
    return { type: 'prompt', text: prompt.text, direction: prompt.direction };
  }
}

function buildTrie(bindings: readonly Binding[]): TrieNode {
  const root: TrieNode = { command: null, children: new Map() };
  for (const binding of bindings) {
    for (const chord of binding.keys) {
      const keys = chordKeys(chord);
      let node = root;
      for (let i = 0; i < keys.length; i++) {
        const key = keys[i];
        let child = node.children.get(key);
        if (!child) {
          child = { command: null, children: new Map() };
          node.children.set(key, child);
        }
        const isLast = i === keys.length - 1;
        if (isLast && (child.command !== null || child.children.size > 0)) {
          throw new Error(`Key binding "${chord}" for ${binding.command} conflicts with another binding`);
        }
        if (!isLast && child.command !== null) {
          throw new Error(`Key binding "${chord}" for ${binding.command} is shadowed by "${keys.slice(0, i + 1).join(' ')}"`);
        }
        if (isLast) child.command = binding.command;
        node = child;
      }
    }
  }
  return root;
}
