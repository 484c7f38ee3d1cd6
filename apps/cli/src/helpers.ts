/**
 * CLI helpers: input/output plumbing, option resolution, error handling.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { getDefaultStorePath, isError, parseFormat } from '@tasksync/core';
import type { DataResult, DocumentFormat } from '@tasksync/core';
import * as out from './output.js';

/** Options registered on the root program, seen by every command */
export type GlobalOptions = {
  from?: string;
  to?: string;
  output?: string;
  store?: string;
};

/** Things a command needs that tests swap out */
export interface CliContext {
  /** Processing date */
  now(): Date;
}

export const defaultContext: CliContext = {
  now: () => new Date(),
};

/** Thrown for bad flag combinations; $try prints it like any other failure */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Read a whole input document. A missing path or "-" means stdin.
 */
export function readInput(path: string | undefined): string {
  if (path === undefined || path === '-') return readFileSync(0, 'utf8');
  return readFileSync(path, 'utf8');
}

/**
 * Write a document to a file, or to stdout when no path is given.
 * Stdout output always ends with a newline.
 */
export function writeOutput(path: string | undefined, content: string): void {
  if (path === undefined || path === '-') {
    process.stdout.write(content.endsWith('\n') || content === '' ? content : content + '\n');
    return;
  }
  writeFileSync(path, content, 'utf8');
}

/** Resolve a --from/--to value; a missing one is a usage error */
export function requireFormat(value: string | undefined, flag: string): DocumentFormat {
  if (value === undefined) {
    throw new UsageError(`Missing --${flag} <format> (markdown or json)`);
  }
  const format = parseFormat(value);
  if (format === null) {
    throw new UsageError(`Unsupported format '${value}' for --${flag} (expected markdown or json)`);
  }
  return format;
}

/**
 * Resolve the store path.
 * Priority: --target-json > --store > TASKSYNC_STORE > platform data dir.
 */
export function resolveStorePath(target: string | undefined, store: string | undefined): string {
  return target ?? store ?? getDefaultStorePath();
}

/**
 * Unwrap a successful result; an error result becomes a thrown failure so
 * $try reports it.
 */
export function unwrap<T>(result: DataResult<T>): T {
  if (isError(result)) throw new Error(result.message);
  return result.data;
}

/**
 * Wrap a command action with error handling.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
