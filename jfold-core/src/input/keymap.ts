/**
 * Command names and the default chord table.
 *
 * Keys are named the way the input layer reports them: printable
 * characters as themselves, plus `up`, `down`, `left`, `right`, `enter`,
 * `space`, `escape`, `backspace`, `tab`, `pageup`, `pagedown`, `home`,
 * `end` and `ctrl-<letter>`. A chord is written as its keys separated by
 * spaces (`"z o"`).
 *
 * @module input/keymap
 */

import defaultBindings from './bindings.json';

export const COMMANDS = [
  'move-down',
  'move-up',
  'top',
  'bottom',
  'next-sibling',
  'prev-sibling',
  'parent-or-collapse',
  'expand-or-child',
  'matching-delimiter',
  'toggle',
  'expand',
  'collapse',
  'expand-recursive',
  'collapse-recursive',
  'expand-all',
  'collapse-all',
  'align-top',
  'align-center',
  'align-bottom',
  'scroll-down',
  'scroll-up',
  'half-page-down',
  'half-page-up',
  'page-down',
  'page-up',
  'scroll-left',
  'scroll-right',
  'search-forward',
  'search-backward',
  'search-next',
  'search-prev',
  'search-key-forward',
  'search-key-backward',
  'copy-value',
  'copy-path',
  'copy-key',
  'toggle-mode',
  'help',
  'reload',
  'quit',
] as const;

export type CommandName = (typeof COMMANDS)[number];

export interface Binding {
  /** Alternative key sequences, each written as space-separated key names. */
  keys: readonly string[];
  command: CommandName;
  group: string;
  description: string;
}

const COMMAND_SET: ReadonlySet<string> = new Set(COMMANDS);

export function isCommandName(value: string): value is CommandName {
  return COMMAND_SET.has(value);
}

interface RawBinding {
  keys: string[];
  command: string;
  group: string;
  description: string;
}

/** Validate a binding table loaded from JSON. */
export function loadBindings(raw: readonly RawBinding[]): Binding[] {
  return raw.map((entry) => {
    if (!isCommandName(entry.command)) {
      throw new Error(`Unknown command in key bindings: ${entry.command}`);
    }
    return { keys: entry.keys, command: entry.command, group: entry.group, description: entry.description };
  });
}

export const DEFAULT_BINDINGS: readonly Binding[] = loadBindings(defaultBindings);

/** Split a written chord into key names. */
export function chordKeys(chord: string): string[] {
  return chord.split(' ').filter((k) => k !== '');
}
