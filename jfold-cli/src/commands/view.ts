/**
 * `jfold [file]`: interactive pager.
 * Uses Ink (React for the terminal) for rendering.
 *
 * The document loads in the background while the pager is already usable;
 * progress triggers throttled re-renders.
 */

import React from 'react';
import { DocumentLoader } from 'jfold-core';
import type { JfoldError, LoadProgress } from 'jfold-core';
import { resolveConfig } from '../config';
import type { PagerConfig, ViewOptions } from '../config';
import { openDocument, openKeyboard } from '../input';
import type { DocumentInput, Keyboard } from '../input';
import { PagerSession } from '../pager/PagerSession';
import { TerminalSession } from '../pager/TerminalSession';
import { Pager } from '../pager/ink/Pager';
import { reportError } from '../reportError';

const RENDER_THROTTLE_MS = 100;
const STATUS_BAR_HEIGHT = 1;

export async function viewAction(file: string | undefined, opts: ViewOptions): Promise<void> {
  let config: PagerConfig;
  let document: DocumentInput;
  let keyboard: Keyboard;
  try {
    config = resolveConfig(file, opts);
    document = await openDocument(config.file);
    keyboard = openKeyboard(config.file === null);
  } catch (err) {
    process.exit(reportError(err));
  }

  const fatal = await runPager(config, document, keyboard);
  keyboard.close();
  process.exit(fatal ? reportError(fatal) : 0);
}

/** Returns the error that ended the session when the first load failed before anything was shown. */
async function runPager(config: PagerConfig, initial: DocumentInput, keyboard: Keyboard): Promise<JfoldError | null> {
  const terminal = new TerminalSession({ mouse: config.mouse });

  return terminal.run(async () => {
    let abort = new AbortController();
    let fatal: JfoldError | null = null;

    const createLoader = (input: DocumentInput) => new DocumentLoader(input.source, {
      mode: config.inputMode,
      collapseDepth: config.collapseDepth,
      path: input.label,
      totalBytes: input.totalBytes,
      signal: abort.signal,
      onProgress: (progress: LoadProgress) => {
        session.documentGrew(progress);
        scheduleRender();
      },
    });

    const loader = createLoader(initial);
    const session = new PagerSession(loader.tree, {
      height: Math.max(0, (process.stdout.rows || 24) - STATUS_BAR_HEIGHT),
      width: process.stdout.columns || 80,
      scrolloff: config.scrolloff,
      viewMode: config.viewMode,
      caseSensitive: config.caseSensitive,
      reloadable: config.file !== null,
    });

    const notifyFailure = (err: unknown) => {
      session.notify(err instanceof Error ? err.message : String(err), 'error');
      scheduleRender();
    };

    // ── Render with Ink ──
    const { render } = await import('ink');

    let revision = 0;
    const element = () => React.createElement(Pager, {
      session,
      label: initial.label,
      mouse: config.mouse,
      onReload: () => {
        reload().catch(notifyFailure);
      },
      revision: ++revision,
    });

    const instance = render(element(), { stdin: keyboard.stream, exitOnCtrlC: false });

    // Re-render bridge: throttled rerender with new props
    let renderTimer: ReturnType<typeof setTimeout> | null = null;
    function scheduleRender() {
      if (renderTimer) return;
      renderTimer = setTimeout(() => {
        renderTimer = null;
        instance.rerender(element());
      }, RENDER_THROTTLE_MS);
    }

    async function runLoad(current: DocumentLoader, first: boolean): Promise<void> {
      const result = await current.load();
      if (result.status === 'cancelled') return;
      if (first && result.status === 'failed' && !result.tree.hasContent) {
        fatal = result.error;
        instance.unmount();
        return;
      }
      session.finishLoad(result);
      scheduleRender();
    }

    async function reload(): Promise<void> {
      if (config.file === null) return;
      const input = await openDocument(config.file);
      abort.abort();
      abort = new AbortController();
      const next = createLoader(input);
      session.replaceDocument(next.tree);
      session.notify(`Reloaded ${input.label}`, 'info');
      scheduleRender();
      await runLoad(next, false);
    }

    runLoad(loader, true).catch(notifyFailure);

    // Wait for exit; a pending read on a pipe is dropped with the process.
    await instance.waitUntilExit();
    abort.abort();
    if (renderTimer) clearTimeout(renderTimer);
    return fatal;
  });
}
