/**
 * Pager state outside React: the document controller, search state, chord
 * input and load status for one open document.
 *
 * Keys go in through `handleKey`; what the UI must do in response (draw,
 * toast, copy, quit, reload) comes back as a KeyResult. Nothing here
 * touches the terminal.
 */

import {
  DocumentController,
  InputStateMachine,
  InvalidPatternError,
  SearchEngine,
  keyPattern,
} from 'jfold-core';
import type {
  Binding,
  CommandName,
  Cursor,
  JfoldError,
  LoadProgress,
  LoadResult,
  SearchDirection,
  SearchMatch,
  ValueTree,
  ViewMode,
} from 'jfold-core';

// ── Types ──

export type ToastSeverity = 'error' | 'warning' | 'info';

export type SessionEffect =
  | { type: 'toast'; message: string; severity: ToastSeverity }
  | { type: 'copy'; text: string; what: string }
  | { type: 'quit' }
  | { type: 'reload' };

export interface KeyResult {
  /** Something visible changed. */
  changed: boolean;
  effects: SessionEffect[];
}

export type LoadState =
  | { status: 'loading'; progress: LoadProgress }
  | { status: 'complete' }
  | { status: 'failed'; error: JfoldError };

export interface PagerSessionOptions {
  height: number;
  width: number;
  scrolloff: number;
  viewMode: ViewMode;
  /** Undefined means smart case. */
  caseSensitive?: boolean;
  /** False when the document came from stdin. */
  reloadable?: boolean;
  bindings?: readonly Binding[];
}

export interface SearchStatus {
  pattern: string;
  /** 1-based, 0 before the first jump. */
  index: number;
  total: number;
}

export interface PromptState {
  text: string;
  direction: SearchDirection;
}

// ── Constants ──

/** Columns moved by `<` and `>`. */
export const HORIZONTAL_STEP = 8;
/** Lines moved by one wheel notch. */
export const WHEEL_STEP = 3;

const NOTHING: KeyResult = { changed: false, effects: [] };

// ── Session ──

export class PagerSession {
  private _controller: DocumentController;
  readonly search = new SearchEngine();
  readonly input: InputStateMachine;
  private _helpVisible = false;
  private _prompt: PromptState | null = null;
  private _load: LoadState = { status: 'loading', progress: { bytesRead: 0, totalBytes: null } };
  private notices: SessionEffect[] = [];
  /** Cursor line to restore once a reloaded document is long enough. */
  private restoreLine: number | null = null;

  constructor(
    tree: ValueTree,
    private readonly options: PagerSessionOptions,
  ) {
    this._controller = this.createController(tree, options.height, options.width, options.viewMode);
    this.input = new InputStateMachine(options.bindings);
  }

  // ── State ──

  get controller(): DocumentController {
    return this._controller;
  }

  get tree(): ValueTree {
    return this._controller.tree;
  }

  get helpVisible(): boolean {
    return this._helpVisible;
  }

  get prompt(): PromptState | null {
    return this._prompt;
  }

  get load(): LoadState {
    return this._load;
  }

  /** Count and chord prefix typed so far. */
  get pending(): string {
    return this.input.pending;
  }

  searchStatus(): SearchStatus | null {
    if (!this.search.active) return null;
    return {
      pattern: this.search.source,
      index: this.search.current + 1,
      total: this.search.matches.length,
    };
  }

  currentMatch(): SearchMatch | null {
    const i = this.search.current;
    return i >= 0 ? this.search.matches[i] : null;
  }

  // ── Keyboard ──

  handleKey(key: string): KeyResult {
    if (this._helpVisible) {
      if (key === 'escape' || key === 'q' || key === 'H') {
        this._helpVisible = false;
        this.input.reset();
        return { changed: true, effects: [] };
      }
      return NOTHING;
    }

    const outcome = this.input.feed(key);
    if (outcome.type === 'command' || outcome.type === 'search') this.restoreLine = null;
    switch (outcome.type) {
      case 'pending':
        return { changed: true, effects: [] };
      case 'invalid':
      case 'reset':
        return { changed: true, effects: [] };
      case 'prompt':
        this._prompt = { text: outcome.text, direction: outcome.direction };
        return { changed: true, effects: [] };
      case 'search-cancelled':
        this._prompt = null;
        return { changed: true, effects: [] };
      case 'search':
        this._prompt = null;
        return this.submitSearch(outcome.pattern, outcome.direction);
      case 'command':
        return this.runCommand(outcome.command, outcome.count);
    }
  }

  // ── Mouse ──

  /** Wheel scrolling; positive is down. */
  scroll(notches: number): KeyResult {
    return { changed: this._controller.scrollViewport(notches * WHEEL_STEP), effects: [] };
  }

  /** Click on pane row `row`: focus it, or toggle it when already focused. */
  clickRow(row: number): KeyResult {
    const c = this._controller;
    const line = c.viewport.top + row;
    if (row < 0 || line >= c.totalLines) return NOTHING;
    this.restoreLine = null;
    if (c.cursor?.line === line) return { changed: c.toggleFocusedCollapse(), effects: [] };
    return { changed: c.moveToLine(line), effects: [] };
  }

  // ── Document lifecycle ──

  resize(height: number, width: number): boolean {
    return this._controller.resize(height, width);
  }

  /** Call after the loader appended nodes. */
  documentGrew(progress: LoadProgress): boolean {
    this._load = { status: 'loading', progress };
    if (this.search.active) this.search.findNew(this.tree);
    this._controller.documentGrew();
    this.applyRestoreLine();
    return true;
  }

  /** Record how loading ended; a failure is queued as a notice. */
  finishLoad(result: Exclude<LoadResult, { status: 'cancelled' }>): void {
    this._controller.documentGrew();
    if (this.search.active) this.search.findNew(this.tree);
    this.applyRestoreLine();
    if (result.status === 'complete') {
      this._load = { status: 'complete' };
      return;
    }
    this._load = { status: 'failed', error: result.error };
    this.notify(result.error.message, 'error');
  }

  /** Queue a toast raised outside key handling (loader, reload). */
  notify(message: string, severity: ToastSeverity): void {
    this.notices.push(toast(message, severity));
  }

  /** Notices queued since the last call. */
  takeNotices(): SessionEffect[] {
    const notices = this.notices;
    this.notices = [];
    return notices;
  }

  /** Swap in a freshly loading tree (reload), keeping view settings and search. */
  replaceDocument(tree: ValueTree): void {
    const previous = this._controller;
    const line = previous.cursor?.line ?? 0;
    this._controller = this.createController(tree, previous.viewport.height, previous.viewport.width, previous.mode);
    this._load = { status: 'loading', progress: { bytesRead: 0, totalBytes: null } };
    if (this.search.active) this.search.findAll(tree);
    this.restoreLine = line;
    this.applyRestoreLine();
  }

  /** Move to the saved line once it exists, or to the last line when loading ended short. */
  private applyRestoreLine(): void {
    const line = this.restoreLine;
    if (line === null) return;
    const c = this._controller;
    if (c.totalLines > line || (!this.tree.growing && c.totalLines > 0)) {
      c.moveToLine(line);
      this.restoreLine = null;
    }
  }

  // ── Commands ──

  private runCommand(command: CommandName, count: number | null): KeyResult {
    const c = this._controller;
    const n = count ?? 1;
    switch (command) {
      case 'move-down':
        return changed(c.move(n));
      case 'move-up':
        return changed(c.move(-n));
      case 'top':
        return changed(count === null ? c.moveToTop() : c.moveToLine(count - 1));
      case 'bottom':
        return changed(count === null ? c.moveToBottom() : c.moveToLine(count - 1));
      case 'next-sibling':
        return changed(repeat(n, () => c.moveToSibling('next')));
      case 'prev-sibling':
        return changed(repeat(n, () => c.moveToSibling('prev')));
      case 'parent-or-collapse':
        return changed(repeat(n, () => c.collapseOrParent()));
      case 'expand-or-child':
        return changed(repeat(n, () => c.expandOrFirstChild()));
      case 'matching-delimiter':
        return changed(c.moveToMatchingDelimiter());
      case 'toggle':
        return changed(c.toggleFocusedCollapse());
      case 'expand':
        return changed(c.expandFocused());
      case 'collapse':
        return changed(c.collapseFocused());
      case 'expand-recursive':
        return changed(c.expandFocusedRecursive());
      case 'collapse-recursive':
        return changed(c.collapseFocusedRecursive());
      case 'expand-all':
        return this.whenLoaded(() => c.expandAll());
      case 'collapse-all':
        return this.whenLoaded(() => c.collapseAll(count ?? 0));
      case 'align-top':
        return changed(c.alignFocused('top'));
      case 'align-center':
        return changed(c.alignFocused('center'));
      case 'align-bottom':
        return changed(c.alignFocused('bottom'));
      case 'scroll-down':
        return changed(c.scrollViewport(n));
      case 'scroll-up':
        return changed(c.scrollViewport(-n));
      case 'half-page-down':
        return changed(c.halfPageDown(n));
      case 'half-page-up':
        return changed(c.halfPageUp(n));
      case 'page-down':
        return changed(c.pageDown(n));
      case 'page-up':
        return changed(c.pageUp(n));
      case 'scroll-left':
        return changed(c.scrollHorizontal(-HORIZONTAL_STEP * n));
      case 'scroll-right':
        return changed(c.scrollHorizontal(HORIZONTAL_STEP * n));
      case 'search-forward':
      case 'search-backward':
        // The input state machine turns these into a prompt.
        return NOTHING;
      case 'search-next':
        return this.jump(this.search.direction, n);
      case 'search-prev':
        return this.jump(opposite(this.search.direction), n);
      case 'search-key-forward':
        return this.searchFocusedKey('forward');
      case 'search-key-backward':
        return this.searchFocusedKey('backward');
      case 'copy-value':
        return this.copy(c.focusedValueText(), 'value');
      case 'copy-path':
        return this.copy(c.focusedPathText(), 'path');
      case 'copy-key':
        return this.copy(c.focusedKeyText(), 'key');
      case 'toggle-mode':
        return changed(c.toggleViewMode());
      case 'help':
        this._helpVisible = true;
        return changed(true);
      case 'reload':
        if (!this.options.reloadable) {
          return { changed: false, effects: [toast('Cannot reload standard input', 'warning')] };
        }
        return { changed: false, effects: [{ type: 'reload' }] };
      case 'quit':
        return { changed: false, effects: [{ type: 'quit' }] };
    }
  }

  private whenLoaded(action: () => boolean): KeyResult {
    if (this.tree.growing) {
      return { changed: false, effects: [toast('Still loading; try again when the document is complete', 'warning')] };
    }
    return changed(action());
  }

  private copy(text: string | null, what: string): KeyResult {
    if (text === null) {
      return { changed: false, effects: [toast(`No ${what} to copy here`, 'warning')] };
    }
    return { changed: false, effects: [{ type: 'copy', text, what }] };
  }

  // ── Search ──

  private submitSearch(pattern: string, direction: SearchDirection): KeyResult {
    try {
      this.search.setPattern(pattern, { caseSensitive: this.options.caseSensitive }, direction);
    } catch (err) {
      if (err instanceof InvalidPatternError) {
        return { changed: true, effects: [toast(err.message, 'error')] };
      }
      throw err;
    }
    if (!this.search.active) return changed(true);
    this.search.findAll(this.tree);
    return this.jump(direction, 1);
  }

  private searchFocusedKey(direction: SearchDirection): KeyResult {
    const cursor = this._controller.cursor;
    const keyRaw = cursor ? this.tree.node(cursor.node).keyRaw : null;
    if (keyRaw === null) {
      return { changed: false, effects: [toast('No key under the cursor', 'warning')] };
    }
    this.search.setPattern(keyPattern(keyRaw), { caseSensitive: true, scope: 'keys' }, direction);
    this.search.findAll(this.tree);
    return this.jump(direction, 1);
  }

  private jump(direction: SearchDirection, count: number): KeyResult {
    if (!this.search.active) {
      return { changed: false, effects: [toast('No previous search', 'info')] };
    }
    // Only the first step starts from the cursor; the cursor moves after the loop.
    let match = this.stepMatch(direction);
    for (let i = 1; match && i < count; i++) {
      match = direction === 'forward' ? this.search.nextMatch() : this.search.prevMatch();
    }
    if (!match) {
      return { changed: true, effects: [toast(`Pattern not found: ${this.search.source}`, 'warning')] };
    }
    this._controller.revealNode(match.node);
    return changed(true);
  }

  /**
   * From the current match when the cursor still sits on its node, so
   * several matches on one row are visited in turn; otherwise from the
   * cursor.
   */
  private stepMatch(direction: SearchDirection): SearchMatch | null {
    const current = this.currentMatch();
    const cursor: Cursor | null = this._controller.cursor;
    if (current && cursor && !cursor.onClose && current.node === cursor.node) {
      return direction === 'forward' ? this.search.nextMatch() : this.search.prevMatch();
    }
    return this.search.seek(this._controller.searchAnchor(direction), direction);
  }

  private createController(tree: ValueTree, height: number, width: number, mode: ViewMode): DocumentController {
    return new DocumentController(tree, { height, width, scrolloff: this.options.scrolloff, mode });
  }
}

// ── Helpers ──

function changed(value: boolean): KeyResult {
  return { changed: value, effects: [] };
}

function toast(message: string, severity: ToastSeverity): SessionEffect {
  return { type: 'toast', message, severity };
}

function opposite(direction: SearchDirection): SearchDirection {
  return direction === 'forward' ? 'backward' : 'forward';
}

/** Run `step` up to `times` times, stopping at the first no-op. */
function repeat(times: number, step: () => boolean): boolean {
  let any = false;
  for (let i = 0; i < times; i++) {
    if (!step()) break;
    any = true;
  }
  return any;
}
