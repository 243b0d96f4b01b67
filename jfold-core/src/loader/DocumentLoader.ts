/**
 * Background parse task: reads a byte stream chunk by chunk, decodes it as
 * UTF-8 and feeds an IncrementalParser, yielding to the event loop after
 * every chunk so the UI can draw the partial document.
 *
 * The tree is available from construction on and grows while `load()`
 * runs. Cancellation is checked at chunk boundaries.
 *
 * @module loader/DocumentLoader
 */

import { StringDecoder } from 'string_decoder';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { IoError, ParseError } from '../errors';
import { IncrementalParser } from '../parser';
import { ValueTree } from '../tree';
import type { ValueTreeOptions } from '../tree';

export type ByteSource = AsyncIterable<Uint8Array | string>;

export interface LoadProgress {
  bytesRead: number;
  /** Null when the source size is unknown (pipes, stdin). */
  totalBytes: number | null;
}

export interface DocumentLoaderOptions extends ValueTreeOptions {
  /** Shown in IoError messages. */
  path?: string;
  totalBytes?: number | null;
  signal?: AbortSignal;
  onProgress?: (progress: LoadProgress) => void;
}

export type LoadResult =
  | { status: 'complete'; tree: ValueTree }
  | { status: 'failed'; tree: ValueTree; error: ParseError | IoError }
  | { status: 'cancelled' };

export class DocumentLoader {
  readonly tree: ValueTree;
  private readonly parser: IncrementalParser;
  private readonly decoder = new StringDecoder('utf8');
  private readonly path: string;
  private readonly totalBytes: number | null;
  private _bytesRead = 0;
  private started = false;

  constructor(
    private readonly source: ByteSource,
    private readonly options: DocumentLoaderOptions = {},
  ) {
    this.tree = new ValueTree(options);
    this.parser = new IncrementalParser(this.tree);
    this.path = options.path ?? '<stdin>';
    this.totalBytes = options.totalBytes ?? null;
  }

  get bytesRead(): number {
    return this._bytesRead;
  }

  get progress(): LoadProgress {
    return { bytesRead: this._bytesRead, totalBytes: this.totalBytes };
  }

  /** Run to completion. Only the first call reads the source. */
  async load(): Promise<LoadResult> {
    if (this.started) throw new Error('DocumentLoader.load() called twice');
    this.started = true;
    const { signal } = this.options;

    try {
      if (signal?.aborted) return { status: 'cancelled' };
      for await (const chunk of this.source) {
        if (signal?.aborted) return { status: 'cancelled' };
        this.feed(chunk);
        await yieldToEventLoop();
        if (signal?.aborted) return { status: 'cancelled' };
      }
      this.parser.push(this.decoder.end());
      this.parser.end();
      return { status: 'complete', tree: this.finish() };
    } catch (err) {
      if (signal?.aborted) return { status: 'cancelled' };
      const error = err instanceof ParseError ? err : IoError.from(err, this.path);
      return { status: 'failed', tree: this.finish(), error };
    }
  }

  private feed(chunk: Uint8Array | string): void {
    if (typeof chunk === 'string') {
      this._bytesRead += Buffer.byteLength(chunk);
      this.parser.push(chunk);
    } else {
      this._bytesRead += chunk.byteLength;
      this.parser.push(this.decoder.write(Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength)));
    }
    this.options.onProgress?.(this.progress);
  }

  private finish(): ValueTree {
    this.tree.finish();
    return this.tree;
  }
}
