/**
 * Formatting helpers for the status bar.
 */

import type { LoadState, SearchStatus } from './PagerSession';

/** Shorten a file path to show only the last 3 segments. */
export function shortenPath(p: string): string {
  const parts = p.replace(/\\/g, '/').split('/');
  if (parts.length <= 3) return p;
  return '.../' + parts.slice(-3).join('/');
}

/** Format a byte count with K/M suffixes. */
export function formatBytes(n: number): string {
  if (n >= 1024 * 1024) return `${(n / (1024 * 1024)).toFixed(1)}M`;
  if (n >= 1024) return `${(n / 1024).toFixed(1)}K`;
  return `${n}B`;
}

/** `line/total pct%`, with the line 1-based. */
export function positionLabel(line: number | null, total: number): string {
  if (line === null || total === 0) return '0/0';
  const pct = total <= 1 ? 100 : Math.round((line / (total - 1)) * 100);
  return `${line + 1}/${total} ${pct}%`;
}

/** Loading progress, or null once loading has ended. */
export function loadLabel(load: LoadState): string | null {
  if (load.status !== 'loading') return null;
  const { bytesRead, totalBytes } = load.progress;
  if (totalBytes !== null && totalBytes > 0) {
    return `loading ${Math.min(100, Math.floor((bytesRead / totalBytes) * 100))}%`;
  }
  return `loading ${formatBytes(bytesRead)}`;
}

export function searchLabel(status: SearchStatus): string {
  return status.index > 0 ? `/${status.pattern} [${status.index}/${status.total}]` : `/${status.pattern} [${status.total}]`;
}
