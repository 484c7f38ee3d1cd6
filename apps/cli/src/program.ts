import { Command } from 'commander';
import type { CliContext, GlobalOptions } from './helpers.js';
import { $try, defaultContext } from './helpers.js';
import { runConvert } from './commands/convert.js';
import { createFmtCommand } from './commands/fmt.js';
import { createApplyCommand } from './commands/apply.js';

/**
 * Build the CLI program. Without a subcommand it converts between
 * markdown and JSONL.
 */
export function createProgram(ctx: CliContext = defaultContext): Command {
  const program = new Command()
    .name('tasksync')
    .description('Convert, format and apply markdown task lists against a JSONL store')
    .version('1.0.0')
    .option('-f, --from <format>', 'Input format: markdown or json')
    .option('-t, --to <format>', 'Output format: markdown or json')
    .option('-o, --output <file>', 'Write the result to a file instead of stdout')
    .option('-s, --store <file>', 'JSONL store file (defaults to TASKSYNC_STORE or the data directory)')
    .argument('[input]', 'Input file for conversion (stdin when omitted or "-")');

  // Register commands
  program.addCommand(createFmtCommand(ctx));
  program.addCommand(createApplyCommand(ctx));

  // Default action (no command): convert
  program.action((input: string | undefined, opts: GlobalOptions) => {
    $try(() => runConvert(input, opts, ctx));
  });

  return program;
}
