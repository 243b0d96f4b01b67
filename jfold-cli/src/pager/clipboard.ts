/**
 * Clipboard copy through the terminal (OSC 52).
 *
 * Works over SSH and inside tmux, where the sequence is wrapped in a DCS
 * passthrough. Returns a result object for the toast instead of throwing.
 */

export interface ClipboardResult {
  success: boolean;
  /** Human-readable message suitable for display in a toast. */
  message: string;
}

export interface ClipboardOptions {
  write?: (data: string) => void;
  env?: NodeJS.ProcessEnv;
}

/** Terminals commonly drop OSC 52 payloads larger than this. */
export const MAX_OSC52_PAYLOAD = 100_000;

const ESC = '\x1b';
const BEL = '\x07';

/** `ESC ] 52 ; c ; <base64> BEL`, wrapped for tmux when `TMUX` is set. */
export function osc52Sequence(text: string, env: NodeJS.ProcessEnv = process.env): string {
  const payload = Buffer.from(text, 'utf8').toString('base64');
  const sequence = `${ESC}]52;c;${payload}${BEL}`;
  if (!env.TMUX) return sequence;
  return `${ESC}Ptmux;${sequence.replaceAll(ESC, ESC + ESC)}${ESC}\\`;
}

export function copyToClipboard(text: string, what: string, options: ClipboardOptions = {}): ClipboardResult {
  const write = options.write ?? ((data: string) => {
    process.stdout.write(data);
  });
  const sequence = osc52Sequence(text, options.env ?? process.env);
  if (sequence.length > MAX_OSC52_PAYLOAD) {
    return { success: false, message: `${capitalize(what)} too large for the terminal clipboard` };
  }
  try {
    write(sequence);
  } catch (err) {
    return { success: false, message: `Clipboard write failed: ${err instanceof Error ? err.message : String(err)}` };
  }
  return { success: true, message: `Copied ${what} to clipboard` };
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}
