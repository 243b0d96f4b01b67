/**
 * Opens the document source and the keyboard.
 *
 * When the document arrives on stdin the keyboard is read from the
 * controlling terminal instead.
 */

import * as fs from 'fs';
import * as tty from 'tty';
import { IoError } from 'jfold-core';
import type { ByteSource } from 'jfold-core';

const READ_CHUNK_BYTES = 64 * 1024;
const STDIN_LABEL = '<stdin>';

export interface DocumentInput {
  source: ByteSource;
  /** Null for pipes. */
  totalBytes: number | null;
  /** Label for messages and the status bar. */
  label: string;
}

export interface Keyboard {
  stream: NodeJS.ReadStream;
  close(): void;
}

/** Fails with IoError before the terminal is touched when the file is unusable. */
export async function openDocument(file: string | null): Promise<DocumentInput> {
  if (file === null) {
    return { source: process.stdin, totalBytes: null, label: STDIN_LABEL };
  }
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(file);
  } catch (err) {
    throw IoError.from(err, file);
  }
  if (stats.isDirectory()) {
    throw new IoError(`${file}: Is a directory`, file);
  }
  return {
    source: fs.createReadStream(file, { highWaterMark: READ_CHUNK_BYTES }),
    totalBytes: stats.isFile() ? stats.size : null,
    label: file,
  };
}

export function openKeyboard(documentOnStdin: boolean): Keyboard {
  if (!documentOnStdin && process.stdin.isTTY) {
    return { stream: process.stdin, close: () => undefined };
  }
  let fd: number;
  try {
    fd = fs.openSync('/dev/tty', 'r');
  } catch (err) {
    throw IoError.from(err, '/dev/tty');
  }
  const stream = new tty.ReadStream(fd);
  return { stream, close: () => stream.destroy() };
}
