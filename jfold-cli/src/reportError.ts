import chalk from 'chalk';
import { UsageError } from './config';

/** Write `Error: message` to stderr and return the exit code for it. */
export function reportError(err: unknown): number {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${chalk.red('Error:')} ${message}\n`);
  return err instanceof UsageError ? 2 : 1;
}
