/**
 * The operations the CLI wraps. Grammar and store failures come back as
 * error results; anything else (I/O errors) still throws.
 */

import type { DataResult } from '../types/results.js';
import { TaskSyncError } from '../errors.js';
import { parseDocument } from '../parsers/document-parser.js';
import { formatDate } from '../parsers/date-parser.js';
import { formatDocument } from '../format/markdown-formatter.js';
import { mergeTasks } from '../merge/merge-engine.js';
import type { MergeResult } from '../merge/merge-engine.js';
import { decodeStore, encodeStore } from '../store/task-store.js';
import type { TaskStore } from '../store/task-store.js';

export const DocumentFormat = {
  Markdown: 'markdown',
  Json: 'json',
} as const;

export type DocumentFormat = (typeof DocumentFormat)[keyof typeof DocumentFormat];

export interface SyncOptions {
  /** Processing date: default creation date, year for MM/DD, `updated` stamp */
  readonly now?: Date;
  readonly indentWidth?: number;
}

export interface ApplyOptions extends SyncOptions {
  /** Compute the merge without writing the store */
  readonly dryRun?: boolean;
}

export interface ApplyOutcome extends MergeResult {
  /** The merged collection rendered as markdown */
  readonly markdown: string;
  readonly written: boolean;
}

/** Run fn, turning sync-core failures into an error result */
function attempt<T>(fn: () => { data: T; message: string }): DataResult<T> {
  try {
    const { data, message } = fn();
    return { type: 'success', data, message };
  } catch (err: unknown) {
    if (err instanceof TaskSyncError) {
      return { type: 'error', message: err.message };
    }
    throw err;
  }
}

/** Parse a format name ("markdown" / "json", any case), or null */
export function parseFormat(name: string): DocumentFormat | null {
  switch (name.trim().toLowerCase()) {
    case 'markdown': case 'md': return DocumentFormat.Markdown;
    case 'json': case 'jsonl': return DocumentFormat.Json;
    default: return null;
  }
}

/** Convert a document between markdown and the JSONL record form */
export function convertDocument(
  input: string,
  from: DocumentFormat,
  to: DocumentFormat,
  opts: SyncOptions = {},
): DataResult<string> {
  return attempt(() => {
    const tasks = from === DocumentFormat.Markdown
      ? parseDocument(input, { now: opts.now, indentWidth: opts.indentWidth })
      : decodeStore(input);

    const data = to === DocumentFormat.Markdown
      ? formatDocument(tasks, { indentWidth: opts.indentWidth })
      : encodeStore(tasks);

    return { data, message: `Converted ${tasks.length} task(s) from ${from} to ${to}` };
  });
}

/** Normalize a markdown document: parse it and render it back */
export function formatMarkdown(input: string, opts: SyncOptions = {}): DataResult<string> {
  return attempt(() => {
    const tasks = parseDocument(input, { now: opts.now, indentWidth: opts.indentWidth });
    return {
      data: formatDocument(tasks, { indentWidth: opts.indentWidth }),
      message: `Formatted ${tasks.length} task(s)`,
    };
  });
}

/**
 * Apply an edited markdown document to a store: load, parse, merge, and
 * (unless dry-running) replace the store with the result.
 */
export function applyMarkdown(
  store: TaskStore,
  markdown: string,
  opts: ApplyOptions = {},
): DataResult<ApplyOutcome> {
  const now = opts.now ?? new Date();

  return attempt(() => {
    const previous = store.load();
    const incoming = parseDocument(markdown, { now, indentWidth: opts.indentWidth });
    const result = mergeTasks(previous, incoming, { today: formatDate(now) });

    const written = !opts.dryRun;
    if (written) store.save(result.tasks);

    return {
      data: {
        ...result,
        markdown: formatDocument(result.tasks, { indentWidth: opts.indentWidth }),
        written,
      },
      message: `${result.added.length} added, ${result.updated.length} updated, ${result.removed.length} removed`,
    };
  });
}
