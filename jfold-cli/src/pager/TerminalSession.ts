/**
 * Owns the terminal modes the pager switches on: alternate screen, hidden
 * cursor and mouse tracking. Raw mode belongs to Ink.
 *
 * `release()` is idempotent and also runs on process exit and on
 * SIGINT/SIGTERM, so the shell gets its screen back however the pager ends.
 */

import type { EventEmitter } from 'events';
import { MOUSE_OFF } from './ink/mouse';
import type { TerminalWrite } from './ink/mouse';

export const ENTER_ALT_SCREEN = '\x1b[?1049h';
export const LEAVE_ALT_SCREEN = '\x1b[?1049l';
export const HIDE_CURSOR = '\x1b[?25l';
export const SHOW_CURSOR = '\x1b[?25h';

const HANDLED_SIGNALS = ['SIGINT', 'SIGTERM'] as const;
type HandledSignal = (typeof HANDLED_SIGNALS)[number];
const SIGNAL_EXIT_CODES: Record<HandledSignal, number> = { SIGINT: 130, SIGTERM: 143 };

export interface TerminalSessionOptions {
  mouse: boolean;
  write?: TerminalWrite;
  /** Where exit and signal handlers are registered. */
  events?: EventEmitter;
  /** Called after release when a handled signal arrives. */
  onSignal?: (exitCode: number) => void;
}

export class TerminalSession {
  private acquired = false;
  private readonly write: TerminalWrite;
  private readonly events: EventEmitter;
  private readonly onSignal: (exitCode: number) => void;
  private readonly exitHandler = () => this.release();
  private readonly signalHandlers = new Map<HandledSignal, () => void>();

  constructor(private readonly options: TerminalSessionOptions) {
    this.write = options.write ?? ((data) => {
      process.stdout.write(data);
    });
    this.events = options.events ?? process;
    this.onSignal = options.onSignal ?? ((code) => process.exit(code));
  }

  get active(): boolean {
    return this.acquired;
  }

  acquire(): void {
    if (this.acquired) return;
    this.acquired = true;
    this.write(ENTER_ALT_SCREEN + HIDE_CURSOR);
    this.events.on('exit', this.exitHandler);
    for (const signal of HANDLED_SIGNALS) {
      const handler = () => {
        this.release();
        this.onSignal(SIGNAL_EXIT_CODES[signal]);
      };
      this.signalHandlers.set(signal, handler);
      this.events.on(signal, handler);
    }
  }

  release(): void {
    if (!this.acquired) return;
    this.acquired = false;
    this.events.removeListener('exit', this.exitHandler);
    for (const [signal, handler] of this.signalHandlers) {
      this.events.removeListener(signal, handler);
    }
    this.signalHandlers.clear();
    this.write((this.options.mouse ? MOUSE_OFF : '') + SHOW_CURSOR + LEAVE_ALT_SCREEN);
  }

  /** Run `body` with the terminal acquired, releasing it however `body` ends. */
  async run<T>(body: () => Promise<T>): Promise<T> {
    this.acquire();
    try {
      return await body();
    } finally {
      this.release();
    }
  }
}
