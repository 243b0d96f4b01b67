import { Command } from 'commander';
import type { CommanderError } from 'commander';
import type { DumpOptions, ViewOptions } from './config';
import { cliVersion } from './version';

/** Usage errors exit with 2; help and version keep their 0. */
function usageExit(err: CommanderError): never {
  process.exit(err.exitCode === 0 ? 0 : 2);
}

const program = new Command();

program
  .name('jfold')
  .description('Interactive pager for JSON and JSON Lines documents')
  .version(cliVersion())
  .exitOverride(usageExit)
  .argument('[file]', 'Document to open; omit or use "-" for standard input')
  .option('--mode <mode>', 'Input mode: json, jsonl (default: from the file extension)')
  .option('--view <view>', 'Initial view: line, data (default: line)')
  .option('--scrolloff <lines>', 'Lines kept visible around the cursor (default: 3)')
  .option('--collapse-depth <depth>', 'Start with containers at this depth or deeper collapsed')
  .option('--case-sensitive', 'Case-sensitive search (default: smart case)')
  .option('--no-mouse', 'Disable mouse support')
  // Ink and React load only when the pager runs
  .action(async (file: string | undefined, opts: ViewOptions) => {
    const { viewAction } = await import('./commands/view');
    return viewAction(file, opts);
  });

// Formatted output without the pager
const dumpCmd = new Command('dump')
  .description('Print the formatted document to standard output')
  .exitOverride(usageExit)
  .argument('[file]', 'Document to print; omit or use "-" for standard input')
  .option('--mode <mode>', 'Input mode: json, jsonl (default: from the file extension)')
  .option('--view <view>', 'Row format: line, data (default: line)')
  .option('--depth <depth>', 'Collapse containers at this depth or deeper')
  .option('--no-color', 'Never color the output')
  .action(async (file: string | undefined, opts: DumpOptions) => {
    const { dumpAction } = await import('./commands/dump');
    return dumpAction(file, opts);
  });
program.addCommand(dumpCmd);

await program.parseAsync();
