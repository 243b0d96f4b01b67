/**
 * Maps Ink's `useInput` arguments to the key names the chord table uses.
 *
 * Ink reports Home and End only as their raw escape sequences (with the
 * leading ESC stripped), so those are recognised here. Pasted text arrives
 * as one string and is split into one key per character.
 */

import type { Key } from 'ink';
import { isMouseInput } from './ink/mouse';

const HOME_SEQUENCES = new Set(['[H', 'OH', '[1~', '[7~']);
const END_SEQUENCES = new Set(['[F', 'OF', '[4~', '[8~']);

export function keyNames(input: string, key: Key): string[] {
  if (isMouseInput(input)) return [];
  if (HOME_SEQUENCES.has(input)) return ['home'];
  if (END_SEQUENCES.has(input)) return ['end'];

  if (key.upArrow) return ['up'];
  if (key.downArrow) return ['down'];
  if (key.leftArrow) return ['left'];
  if (key.rightArrow) return ['right'];
  if (key.pageUp) return ['pageup'];
  if (key.pageDown) return ['pagedown'];
  if (key.return) return ['enter'];
  if (key.escape) return ['escape'];
  if (key.tab) return ['tab'];
  // Most terminals send DEL for Backspace, which Ink reports as delete.
  if (key.backspace || key.delete) return ['backspace'];

  if (key.ctrl) return /^[a-z]$/.test(input) ? [`ctrl-${input}`] : [];
  if (key.meta) return [];

  return [...input].map((ch) => (ch === ' ' ? 'space' : ch));
}

const KEY_LABELS: Record<string, string> = {
  up: '↑',
  down: '↓',
  left: '←',
  right: '→',
  enter: 'Enter',
  escape: 'Esc',
  space: 'Space',
  tab: 'Tab',
  backspace: 'Bksp',
  pageup: 'PgUp',
  pagedown: 'PgDn',
  home: 'Home',
  end: 'End',
};

/** Display form of a written chord: `g g` as `gg`, `ctrl-d` as `Ctrl+D`. */
export function formatChord(chord: string): string {
  return chord
    .split(' ')
    .filter((k) => k !== '')
    .map((k) => {
      if (k.startsWith('ctrl-')) return `Ctrl+${k.slice(5).toUpperCase()}`;
      return KEY_LABELS[k] ?? k;
    })
    .join('');
}
