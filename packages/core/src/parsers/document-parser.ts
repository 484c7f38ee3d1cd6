/**
 * Builds a task forest from a markdown document.
 *
 * Three stages, in order:
 *   1. collectExplicitIds - every `id:` in the document is reserved before
 *      any automatic id is handed out, so a later explicit id never collides
 *      with an earlier automatic one.
 *   2. parseTaskLines - each task line is parsed, given its display order
 *      (1-based among task lines) and an id.
 *   3. assembleForest - indentation decides parent/child links; owned trees
 *      are built once every entry is known.
 */

import type { IsoDate, Task, TaskId } from '../types/task.js';
import { GrammarMismatchError } from '../errors.js';
import { DEFAULT_INDENT_WIDTH } from '../config.js';
import { TASK_LINE_RE } from './attribute-grammar.js';
import { parseLine, scanExplicitId } from './line-parser.js';
import type { ParsedLine } from './line-parser.js';
import { IdAllocator } from './id-allocator.js';
import { formatDate } from './date-parser.js';

export interface DocumentParseOptions {
  /** Creation date for lines without `created:`. Defaults to the processing date. */
  readonly defaultCreated?: IsoDate;
  /** Processing date. Defaults to now. */
  readonly now?: Date;
  /** Leading spaces per nesting level */
  readonly indentWidth?: number;
}

/** A parsed line waiting to be attached to the tree */
interface ArenaEntry {
  readonly task: Task;
  readonly depth: number;
  readonly children: number[];
}

export interface TaskLine {
  readonly text: string;
  readonly lineNumber: number;
}

/** Lines that start with "- [" after indentation, with their 1-based line numbers */
function taskLines(document: string): TaskLine[] {
  const result: TaskLine[] = [];
  const lines = document.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const text = lines[i]!;
    if (!text.trim() || !TASK_LINE_RE.test(text)) continue;
    result.push({ text, lineNumber: i + 1 });
  }
  return result;
}

/** Nesting depth from leading spaces */
export function indentDepth(line: string, indentWidth: number = DEFAULT_INDENT_WIDTH): number {
  let spaces = 0;
  while (spaces < line.length && line[spaces] === ' ') spaces++;
  return Math.floor(spaces / indentWidth);
}

// ---------------------------------------------------------------------------
// Stage 1: explicit ids
// ---------------------------------------------------------------------------

export function collectExplicitIds(lines: readonly TaskLine[]): Set<TaskId> {
  const ids = new Set<TaskId>();
  for (const line of lines) {
    const id = scanExplicitId(line.text);
    if (id != null) ids.add(id);
  }
  return ids;
}

// ---------------------------------------------------------------------------
// Stage 2: per-line parse and id resolution
// ---------------------------------------------------------------------------

function parseTaskLines(
  lines: readonly TaskLine[],
  ids: IdAllocator,
  opts: { defaultCreated: IsoDate; now: Date; indentWidth: number },
): ArenaEntry[] {
  const arena: ArenaEntry[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]!;
    let parsed: ParsedLine;
    try {
      parsed = parseLine(line.text, {
        defaultCreated: opts.defaultCreated,
        displayOrder: i + 1,
        now: opts.now,
      });
    } catch (err: unknown) {
      if (err instanceof GrammarMismatchError) {
        throw new GrammarMismatchError(err.line, line.lineNumber);
      }
      throw err;
    }

    let id: TaskId;
    if (parsed.explicitId != null) {
      id = parsed.explicitId;
      ids.reserve(id);
    } else {
      id = ids.next();
    }

    arena.push({
      task: { id, ...parsed.task },
      depth: indentDepth(line.text, opts.indentWidth),
      children: [],
    });
  }

  return arena;
}

// ---------------------------------------------------------------------------
// Stage 3: tree assembly
// ---------------------------------------------------------------------------

/** Materialize an owned task from an arena entry and its (already final) children */
function materialize(arena: readonly ArenaEntry[], index: number): Task {
  const entry = arena[index]!;
  if (entry.children.length === 0) return entry.task;
  return {
    ...entry.task,
    subtasks: entry.children.map(child => materialize(arena, child)),
  };
}

function assembleForest(arena: ArenaEntry[]): Task[] {
  const roots: number[] = [];
  // (arena index, depth) of the current chain of ancestors
  const stack: Array<{ index: number; depth: number }> = [];

  for (let i = 0; i < arena.length; i++) {
    const depth = arena[i]!.depth;
    while (stack.length > 0 && stack[stack.length - 1]!.depth >= depth) {
      stack.pop();
    }

    const parent = stack[stack.length - 1];
    if (parent) {
      arena[parent.index]!.children.push(i);
    } else {
      roots.push(i);
    }
    stack.push({ index: i, depth });
  }

  return roots.map(index => materialize(arena, index));
}

/**
 * Parse a whole document into root tasks with nested subtasks.
 * Lines that aren't task lines are skipped; a malformed task line aborts
 * the parse with a GrammarMismatchError naming its line number.
 */
export function parseDocument(document: string, opts: DocumentParseOptions = {}): Task[] {
  const now = opts.now ?? new Date();
  const resolved = {
    now,
    defaultCreated: opts.defaultCreated ?? formatDate(now),
    indentWidth: opts.indentWidth ?? DEFAULT_INDENT_WIDTH,
  };

  const lines = taskLines(document);
  const ids = new IdAllocator(collectExplicitIds(lines));
  const arena = parseTaskLines(lines, ids, resolved);
  return assembleForest(arena);
}
