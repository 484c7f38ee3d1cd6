import { Command } from 'commander';
import { formatMarkdown, getIndentWidth } from '@tasksync/core';
import type { CliContext, GlobalOptions } from '../helpers.js';
import { $try, UsageError, readInput, unwrap, writeOutput } from '../helpers.js';
import * as out from '../output.js';

export function createFmtCommand(ctx: CliContext): Command {
  return new Command('fmt')
    .description('Normalize a markdown task list')
    .argument('[input]', 'Markdown file to format (stdin when omitted or "-")')
    .option('-i, --in-place', 'Rewrite the input file instead of printing')
    .action((input: string | undefined, opts: { inPlace?: boolean }, cmd: Command) => {
      $try(() => {
        const globals = cmd.optsWithGlobals<GlobalOptions & { inPlace?: boolean }>();

        if (opts.inPlace && globals.output !== undefined) {
          throw new UsageError('--in-place cannot be used with --output (-o)');
        }
        if (opts.inPlace && (input === undefined || input === '-')) {
          throw new UsageError('--in-place requires a named input file, not stdin');
        }

        const formatted = unwrap(formatMarkdown(readInput(input), {
          now: ctx.now(),
          indentWidth: getIndentWidth(),
        }));

        if (opts.inPlace && input !== undefined) {
          writeOutput(input, formatted);
          out.success(`Formatted file in-place: ${input}`);
        } else {
          writeOutput(globals.output, formatted);
        }
      });
    });
}
