/**
 * Error types raised by the document engine.
 *
 * Every error carries a `kind` discriminant so callers can switch on it
 * without `instanceof` chains.
 *
 * @module errors
 */

export type JfoldErrorKind = 'parse' | 'invalid-pattern' | 'io' | 'invalid-chord';

export abstract class JfoldError extends Error {
  abstract readonly kind: JfoldErrorKind;
}

/** Malformed input. `line` and `column` are 1-based. */
export class ParseError extends JfoldError {
  readonly kind = 'parse' as const;

  constructor(
    readonly reason: string,
    readonly line: number,
    readonly column: number,
  ) {
    super(`${reason} at line ${line}, column ${column}`);
    this.name = 'ParseError';
  }
}

export class InvalidPatternError extends JfoldError {
  readonly kind = 'invalid-pattern' as const;

  constructor(
    readonly pattern: string,
    reason: string,
  ) {
    super(`Invalid pattern /${pattern}/: ${reason}`);
    this.name = 'InvalidPatternError';
  }
}

export class IoError extends JfoldError {
  readonly kind = 'io' as const;

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'IoError';
  }

  /** Build an IoError from whatever a stream or fs call rejected with. */
  static from(err: unknown, path: string): IoError {
    if (err instanceof IoError) return err;
    const code = isErrnoException(err) ? err.code : undefined;
    const detail = code === 'ENOENT' ? 'No such file or directory'
      : code === 'EACCES' ? 'Permission denied'
      : code === 'EISDIR' ? 'Is a directory'
      : err instanceof Error ? err.message
      : String(err);
    return new IoError(`${path}: ${detail}`, path, { cause: err });
  }
}

/** A key sequence that matches nothing in the chord table. */
export class InvalidChordError extends JfoldError {
  readonly kind = 'invalid-chord' as const;

  constructor(readonly keys: readonly string[]) {
    super(`No binding for ${keys.join(' ')}`);
    this.name = 'InvalidChordError';
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}
