/**
 * Parse SGR 1006 mouse reports out of raw keyboard input.
 *
 * A single read can carry several reports (fast wheel scrolling), so the
 * parser returns all of them in order.
 */

export interface TerminalMouseEvent {
  type: 'press' | 'release' | 'scroll';
  button: 'left' | 'middle' | 'right' | 'none';
  /** 0-based column. */
  x: number;
  /** 0-based row. */
  y: number;
  scrollDirection?: 'up' | 'down';
}

// ESC [ < Cb ; Cx ; Cy (M|m), ESC optional since Ink strips it from input
const SGR_MOUSE_RE = /\x1b?\[<(\d+);(\d+);(\d+)([Mm])/g;
const MODIFIER_BITS = 4 | 8 | 16;
const BUTTONS = ['left', 'middle', 'right'] as const;

export function parseMouseEvents(data: Buffer | string): TerminalMouseEvent[] {
  const str = typeof data === 'string' ? data : data.toString('utf-8');
  const events: TerminalMouseEvent[] = [];
  for (const match of str.matchAll(SGR_MOUSE_RE)) {
    const event = decode(
      Number.parseInt(match[1], 10),
      Number.parseInt(match[2], 10) - 1,
      Number.parseInt(match[3], 10) - 1,
      match[4] === 'm',
    );
    if (event) events.push(event);
  }
  return events;
}

/** True when `input` is nothing but mouse reports. */
export function isMouseInput(input: string): boolean {
  return input.length > 0 && input.replace(SGR_MOUSE_RE, '') === '';
}

function decode(code: number, x: number, y: number, isRelease: boolean): TerminalMouseEvent | null {
  const base = code & ~MODIFIER_BITS;
  if (base === 64 || base === 65) {
    return { type: 'scroll', button: 'none', x, y, scrollDirection: base === 64 ? 'up' : 'down' };
  }
  // Motion reports (32+) are not requested; anything else is a button.
  if (base >= 0 && base <= 2) {
    return { type: isRelease ? 'release' : 'press', button: BUTTONS[base], x, y };
  }
  return null;
}
