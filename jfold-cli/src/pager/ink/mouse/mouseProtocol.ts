/**
 * SGR 1006 mouse tracking switches.
 */

export type TerminalWrite = (data: string) => void;

/** Button events + SGR extended coordinates. */
export const MOUSE_ON = '\x1b[?1000h\x1b[?1006h';
/** Reverse order of MOUSE_ON. */
export const MOUSE_OFF = '\x1b[?1006l\x1b[?1000l';

const stdoutWrite: TerminalWrite = (data) => {
  process.stdout.write(data);
};

export function enableMouse(write: TerminalWrite = stdoutWrite): void {
  write(MOUSE_ON);
}

export function disableMouse(write: TerminalWrite = stdoutWrite): void {
  write(MOUSE_OFF);
}
