/**
 * `jfold dump [file]`: print the formatted document without the pager.
 *
 * Rows are rendered exactly as the pager would show them, with containers
 * at `--depth` or deeper collapsed to one line.
 */

import { DocumentLoader } from 'jfold-core';
import { resolveDumpConfig } from '../config';
import type { DumpOptions } from '../config';
import { openDocument } from '../input';
import { formatDump } from '../dumpFormat';
import { reportError } from '../reportError';

const WRITE_BATCH_CHARS = 64 * 1024;

export async function dumpAction(file: string | undefined, opts: DumpOptions): Promise<void> {
  try {
    const config = resolveDumpConfig(file, opts, process.stdout.isTTY === true);
    const input = await openDocument(config.file);
    const loader = new DocumentLoader(input.source, {
      mode: config.inputMode,
      collapseDepth: config.depth,
      path: input.label,
      totalBytes: input.totalBytes,
    });
    const result = await loader.load();
    if (result.status === 'cancelled') return;
    if (result.status === 'failed' && !result.tree.hasContent) throw result.error;

    let batch = '';
    for (const row of formatDump(result.tree, { mode: config.viewMode, color: config.color })) {
      batch += row + '\n';
      if (batch.length >= WRITE_BATCH_CHARS) {
        process.stdout.write(batch);
        batch = '';
      }
    }
    if (batch) process.stdout.write(batch);

    // A truncated document is still printed, then reported.
    if (result.status === 'failed') process.exitCode = reportError(result.error);
  } catch (err) {
    process.exitCode = reportError(err);
  }
}
