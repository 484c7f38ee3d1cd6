/**
 * Turns one markdown task line into task fields.
 * The base shape is strict; every attribute after the name is optional and
 * degrades to "absent" when its value does not parse.
 */

import type { IsoDate, Task, TaskId } from '../types/task.js';
import { statusFromMarker } from '../types/task-status.js';
import { NO_PRIORITY } from '../types/priority.js';
import { GrammarMismatchError } from '../errors.js';
import {
  BASE_LINE_RE, LIST_MARKER_RE, EMPTY_VALUE,
  PROJECT_RE, CONTEXT_RE, TAG_RE,
  allMatches, extractNote, matchDateAttribute, matchId,
} from './attribute-grammar.js';
import type { DateAttribute } from './attribute-grammar.js';
import { parseDate } from './date-parser.js';

export interface LineParseOptions {
  /** Used when the line has no valid `created:` attribute */
  readonly defaultCreated: IsoDate;
  readonly displayOrder: number;
  /** Processing date; completes MM/DD and M/D dates */
  readonly now: Date;
}

export interface ParsedLine {
  /** The `id:` attribute, or null when the builder must allocate one */
  readonly explicitId: TaskId | null;
  readonly task: Omit<Task, 'id'>;
}

/** Split a line into its base groups, or null if it isn't a task line */
function matchBase(line: string) {
  const m = BASE_LINE_RE.exec(line);
  if (!m) return null;
  return {
    marker: m[1]!,
    priority: m[2] ?? NO_PRIORITY,
    name: (m[3] ?? m[4] ?? '').trim(),
    tail: (m[5] ?? '').trim(),
  };
}

/** Strip indentation and the list marker, leaving "[x] ..." */
export function stripListMarker(line: string): string {
  return line.replace(LIST_MARKER_RE, '').trim();
}

/**
 * Explicit id of a task line without parsing the rest of it.
 * Used by the id pre-scan; lines that don't match yield null.
 */
export function scanExplicitId(line: string): TaskId | null {
  const base = matchBase(stripListMarker(line));
  if (!base) return null;
  return matchId(extractNote(base.tail).rest);
}

/** A nullable date: `""` and unparseable values both mean "no date" */
function nullableDate(attr: DateAttribute, tail: string, now: Date): IsoDate | null {
  const raw = matchDateAttribute(attr, tail);
  if (raw == null || raw === EMPTY_VALUE) return null;
  return parseDate(raw, now);
}

/**
 * Parse a task line. Throws GrammarMismatchError when the checkbox or the
 * name is missing.
 */
export function parseLine(line: string, opts: LineParseOptions): ParsedLine {
  const content = stripListMarker(line);
  const base = matchBase(content);
  if (!base || !base.name) {
    throw new GrammarMismatchError(content);
  }

  const { note, rest } = extractNote(base.tail);
  const contexts = allMatches(CONTEXT_RE, rest);
  const tags = allMatches(TAG_RE, rest);
  const project = PROJECT_RE.exec(rest);
  const createdRaw = matchDateAttribute('created', rest);

  const task: Omit<Task, 'id'> = {
    name: base.name,
    status: statusFromMarker(base.marker),
    priority: base.priority,
    created: parseDate(createdRaw, opts.now) ?? opts.defaultCreated,
    displayOrder: opts.displayOrder,
    due: nullableDate('due', rest, opts.now),
    updated: nullableDate('updated', rest, opts.now),
    completed: nullableDate('completed', rest, opts.now),
    ...(project ? { project: project[1]! } : {}),
    ...(contexts.length > 0 ? { contexts } : {}),
    ...(tags.length > 0 ? { tags } : {}),
    ...(note != null ? { notes: note } : {}),
  };

  return { explicitId: matchId(rest), task };
}
