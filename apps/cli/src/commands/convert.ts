import { convertDocument, getIndentWidth } from '@tasksync/core';
import type { CliContext, GlobalOptions } from '../helpers.js';
import { readInput, requireFormat, unwrap, writeOutput } from '../helpers.js';
import * as out from '../output.js';

/**
 * Conversion mode: `tasksync --from <format> --to <format> [input]`.
 * Runs when no subcommand is given.
 */
export function runConvert(input: string | undefined, opts: GlobalOptions, ctx: CliContext): void {
  const from = requireFormat(opts.from, 'from');
  const to = requireFormat(opts.to, 'to');

  const result = convertDocument(readInput(input), from, to, {
    now: ctx.now(),
    indentWidth: getIndentWidth(),
  });
  writeOutput(opts.output, unwrap(result));

  if (opts.output !== undefined) out.success(result.message);
}
