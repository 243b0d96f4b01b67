/**
 * Root Ink component: document pane, status bar, help overlay and toasts.
 *
 * Navigation state lives in PagerSession; this component only routes keys
 * and mouse events to it and carries out the effects it returns.
 */

import React, { useReducer, useCallback, useEffect, useRef } from 'react';
import { Box, useInput, useApp } from 'ink';
import type { PagerSession, SessionEffect, ToastSeverity } from '../PagerSession';
import { keyNames } from '../keys';
import { copyToClipboard } from '../clipboard';
import { useTerminalSize } from './useTerminalSize';
import { DocumentPane } from './DocumentPane';
import { StatusBar } from './StatusBar';
import { HelpOverlay } from './HelpOverlay';
import { TooSmallOverlay } from './TooSmallOverlay';
import { ToastNotification } from './ToastNotification';
import type { ToastEntry } from './ToastNotification';
import { MouseProvider } from './mouse';
import type { TerminalMouseEvent } from './mouse';

// ── Constants ──

const MIN_SCREEN_WIDTH = 20;
const MIN_SCREEN_HEIGHT = 5;
const STATUS_BAR_HEIGHT = 1;
const TOAST_DURATION_MS: Record<ToastSeverity, number> = { error: 4000, warning: 3000, info: 2000 };

// ── State ──

interface PagerUIState {
  toasts: ToastEntry[];
  renderTick: number;
}

type PagerAction =
  | { type: 'ADD_TOAST'; toast: ToastEntry }
  | { type: 'REMOVE_TOAST'; id: number }
  | { type: 'TICK' };

function pagerReducer(state: PagerUIState, action: PagerAction): PagerUIState {
  switch (action.type) {
    case 'ADD_TOAST':
      return { ...state, toasts: [...state.toasts, action.toast] };
    case 'REMOVE_TOAST':
      return { ...state, toasts: state.toasts.filter(t => t.id !== action.id) };
    case 'TICK':
      return { ...state, renderTick: state.renderTick + 1 };
  }
}

const initialState: PagerUIState = { toasts: [], renderTick: 0 };

// ── Props ──

export interface PagerProps {
  session: PagerSession;
  /** File name or `<stdin>`. */
  label: string;
  mouse: boolean;
  onReload: () => void;
  /** Bumped by the caller to redraw after loader progress. */
  revision: number;
}

export function Pager({ session, label, mouse, onReload }: PagerProps): React.ReactElement {
  const { exit } = useApp();
  const { columns, rows } = useTerminalSize();
  const [state, dispatch] = useReducer(pagerReducer, initialState);
  const toastIdRef = useRef(0);

  const paneHeight = Math.max(0, rows - STATUS_BAR_HEIGHT);
  const tooSmall = columns < MIN_SCREEN_WIDTH || rows < MIN_SCREEN_HEIGHT;
  session.resize(paneHeight, columns);

  // ── Toast management ──
  const addToast = useCallback((message: string, severity: ToastSeverity) => {
    const id = ++toastIdRef.current;
    dispatch({ type: 'ADD_TOAST', toast: { id, message, severity } });
    setTimeout(() => {
      dispatch({ type: 'REMOVE_TOAST', id });
    }, TOAST_DURATION_MS[severity]);
  }, []);

  const applyEffects = useCallback((effects: readonly SessionEffect[]) => {
    for (const effect of effects) {
      switch (effect.type) {
        case 'toast':
          addToast(effect.message, effect.severity);
          break;
        case 'copy': {
          const result = copyToClipboard(effect.text, effect.what);
          addToast(result.message, result.success ? 'info' : 'error');
          break;
        }
        case 'quit':
          exit();
          break;
        case 'reload':
          onReload();
          break;
      }
    }
  }, [addToast, exit, onReload]);

  // Notices raised by the loader or a reload since the last render.
  useEffect(() => {
    applyEffects(session.takeNotices());
  });

  // ── Keyboard input ──
  useInput((input, key) => {
    let changed = false;
    const effects: SessionEffect[] = [];
    for (const name of keyNames(input, key)) {
      const result = session.handleKey(name);
      changed = changed || result.changed;
      effects.push(...result.effects);
    }
    if (changed) dispatch({ type: 'TICK' });
    applyEffects(effects);
  });

  // ── Mouse input ──
  const handleMouse = useCallback((event: TerminalMouseEvent) => {
    if (session.helpVisible) {
      if (event.type === 'press') {
        session.handleKey('escape');
        dispatch({ type: 'TICK' });
      }
      return;
    }

    if (event.type === 'scroll') {
      if (session.scroll(event.scrollDirection === 'down' ? 1 : -1).changed) dispatch({ type: 'TICK' });
      return;
    }

    // Left button only; y is 0-based from the top of the screen.
    if (event.type === 'press' && event.button === 'left' && event.y < paneHeight) {
      if (session.clickRow(event.y).changed) dispatch({ type: 'TICK' });
    }
  }, [session, paneHeight]);

  // ── Render ──

  if (tooSmall) {
    return <TooSmallOverlay columns={columns} rows={rows} minColumns={MIN_SCREEN_WIDTH} minRows={MIN_SCREEN_HEIGHT} />;
  }

  const body = (
    <Box flexDirection="column" height={rows} width={columns}>
      {session.helpVisible
        ? <HelpOverlay bindings={session.input.listBindings()} width={columns} height={paneHeight} />
        : <DocumentPane session={session} width={columns} height={paneHeight} />}

      <StatusBar session={session} label={label} width={columns} />

      {state.toasts.length > 0 && (
        <ToastNotification toast={state.toasts[state.toasts.length - 1]} columns={columns} />
      )}
    </Box>
  );

  return mouse ? <MouseProvider onMouse={handleMouse}>{body}</MouseProvider> : body;
}
