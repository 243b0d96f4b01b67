/**
 * Turns raw commander options into typed configuration.
 *
 * Pure: no I/O, no process access. Bad values throw UsageError, which the
 * command layer reports with exit code 2.
 */

import type { InputMode, ViewMode } from 'jfold-core';

// ── Types ──

export interface PagerConfig {
  /** Null reads the document from stdin. */
  file: string | null;
  inputMode: InputMode;
  viewMode: ViewMode;
  scrolloff: number;
  collapseDepth: number | null;
  /** Undefined means smart case. */
  caseSensitive: boolean | undefined;
  mouse: boolean;
}

export interface DumpConfig {
  file: string | null;
  inputMode: InputMode;
  viewMode: ViewMode;
  depth: number | null;
  color: boolean;
}

/** Options as commander hands them over. */
export interface ViewOptions {
  mode?: string;
  view?: string;
  scrolloff?: string;
  collapseDepth?: string;
  caseSensitive?: boolean;
  mouse?: boolean;
}

export interface DumpOptions {
  mode?: string;
  view?: string;
  depth?: string;
  color?: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// ── Constants ──

export const DEFAULT_SCROLLOFF = 3;
const JSONL_EXTENSIONS = ['.jsonl', '.ndjson'];

// ── Resolution ──

export function resolveConfig(file: string | undefined, opts: ViewOptions): PagerConfig {
  const path = resolveFile(file);
  return {
    file: path,
    inputMode: resolveInputMode(opts.mode, path),
    viewMode: resolveViewMode(opts.view),
    scrolloff: opts.scrolloff === undefined ? DEFAULT_SCROLLOFF : parseCount('--scrolloff', opts.scrolloff),
    collapseDepth: opts.collapseDepth === undefined ? null : parseCount('--collapse-depth', opts.collapseDepth),
    caseSensitive: opts.caseSensitive ? true : undefined,
    mouse: opts.mouse !== false,
  };
}

export function resolveDumpConfig(file: string | undefined, opts: DumpOptions, stdoutIsTTY: boolean): DumpConfig {
  const path = resolveFile(file);
  return {
    file: path,
    inputMode: resolveInputMode(opts.mode, path),
    viewMode: resolveViewMode(opts.view),
    depth: opts.depth === undefined ? null : parseCount('--depth', opts.depth),
    color: opts.color !== false && stdoutIsTTY,
  };
}

function resolveFile(file: string | undefined): string | null {
  return file === undefined || file === '-' ? null : file;
}

function resolveInputMode(mode: string | undefined, file: string | null): InputMode {
  if (mode === undefined) {
    const lower = file?.toLowerCase() ?? '';
    return JSONL_EXTENSIONS.some((ext) => lower.endsWith(ext)) ? 'jsonl' : 'json';
  }
  if (mode === 'json' || mode === 'jsonl') return mode;
  throw new UsageError(`--mode must be "json" or "jsonl", got "${mode}"`);
}

function resolveViewMode(view: string | undefined): ViewMode {
  if (view === undefined) return 'line';
  if (view === 'line' || view === 'data') return view;
  throw new UsageError(`--view must be "line" or "data", got "${view}"`);
}

function parseCount(flag: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`${flag} must be a non-negative integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}
