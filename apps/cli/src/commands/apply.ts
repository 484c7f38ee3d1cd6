import { Command } from 'commander';
import { DocumentFormat, TaskStore, applyMarkdown, getIndentWidth } from '@tasksync/core';
import type { ApplyOutcome, Task } from '@tasksync/core';
import type { CliContext, GlobalOptions } from '../helpers.js';
import { $try, UsageError, readInput, requireFormat, resolveStorePath, unwrap, writeOutput } from '../helpers.js';
import * as out from '../output.js';

type ApplyCommandOptions = {
  targetJson?: string;
  dryRun?: boolean;
};

/** Names of the given top-level ids, in collection order */
function namesOf(tasks: readonly Task[], ids: readonly number[]): string[] {
  const wanted = new Set(ids);
  return tasks.filter(t => wanted.has(t.id)).map(t => t.name);
}

/** Lines printed instead of writing the store */
export function formatDryRunSummary(outcome: ApplyOutcome): string {
  const lines = ['Dry run summary:', 'Added tasks:'];
  for (const name of namesOf(outcome.tasks, outcome.added)) {
    lines.push(`  ${name}`);
  }
  lines.push(`Updated tasks: ${outcome.updated.length}`);
  lines.push(`Removed tasks: ${outcome.removed.length}`);
  return lines.join('\n');
}

export function createApplyCommand(ctx: CliContext): Command {
  return new Command('apply')
    .description('Merge an edited markdown task list into the JSONL store')
    .argument('[input]', 'Markdown file to apply (stdin when omitted or "-")')
    .option('--target-json <file>', 'Store file to update (defaults to --store)')
    .option('--dry-run', 'Show what would change without writing the store')
    .action((input: string | undefined, opts: ApplyCommandOptions, cmd: Command) => {
      $try(() => {
        const globals = cmd.optsWithGlobals<GlobalOptions & ApplyCommandOptions>();

        if (globals.from !== undefined && requireFormat(globals.from, 'from') !== DocumentFormat.Markdown) {
          throw new UsageError("--from must be 'markdown' for apply");
        }

        const store = new TaskStore(resolveStorePath(opts.targetJson, globals.store));
        const result = applyMarkdown(store, readInput(input), {
          now: ctx.now(),
          indentWidth: getIndentWidth(),
          dryRun: opts.dryRun,
        });
        const outcome = unwrap(result);

        if (opts.dryRun) {
          writeOutput(undefined, formatDryRunSummary(outcome));
          return;
        }

        writeOutput(globals.output, outcome.markdown);
        out.success(`${result.message} (${store.path})`);
      });
    });
}
