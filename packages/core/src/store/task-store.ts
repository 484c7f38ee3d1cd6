/**
 * JSONL task store: one top-level task (with its nested subtasks) per line.
 * The file is always replaced as a whole.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Task } from '../types/task.js';
import { TaskStatus, statusFromWord } from '../types/task-status.js';
import { StoreRecordMalformedError } from '../errors.js';
import { RECORD_KEYS, taskRecordSchema } from './record-schema.js';
import type { TaskRecord } from './record-schema.js';

// ---------------------------------------------------------------------------
// Decode
// ---------------------------------------------------------------------------

/** Non-empty list, or undefined so the key disappears */
function nonEmpty<T>(items: T[] | null | undefined): T[] | undefined {
  return items && items.length > 0 ? items : undefined;
}

/** Top-level keys the record schema doesn't know, merged under `extra` */
function foldExtra(record: TaskRecord): Record<string, unknown> | undefined {
  const unknown: Record<string, unknown> = {};
  let found = false;
  for (const [key, value] of Object.entries(record)) {
    if (RECORD_KEYS.has(key)) continue;
    unknown[key] = value;
    found = true;
  }
  if (!found) return record.extra ?? undefined;
  // Keys already inside extra win over loose ones
  return { ...unknown, ...(record.extra ?? {}) };
}

/** Map a validated record to a task */
function toTask(record: TaskRecord): Task {
  const subtasks = nonEmpty(record.subtasks)?.map(toTask);
  const contexts = nonEmpty(record.contexts);
  const tags = nonEmpty(record.tags);
  const extra = foldExtra(record);

  return {
    id: record.id,
    name: record.name,
    status: statusFromWord(record.status) ?? TaskStatus.Unknown,
    priority: record.priority,
    created: record.created,
    displayOrder: record.display_order,
    due: record.due ?? null,
    updated: record.updated ?? null,
    completed: record.completed ?? null,
    ...(record.project != null ? { project: record.project } : {}),
    ...(contexts ? { contexts } : {}),
    ...(tags ? { tags } : {}),
    ...(record.notes != null ? { notes: record.notes } : {}),
    ...(subtasks ? { subtasks } : {}),
    ...(extra ? { extra } : {}),
    ...(record.repeat != null ? { repeat: record.repeat } : {}),
  };
}

/** Decode one JSONL line. Throws StoreRecordMalformedError. */
export function decodeRecord(line: string, lineNumber: number): Task {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (err: unknown) {
    throw new StoreRecordMalformedError(lineNumber, err instanceof Error ? err.message : String(err));
  }

  const parsed = taskRecordSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const reason = issue
      ? `${issue.path.length > 0 ? issue.path.join('.') + ': ' : ''}${issue.message}`
      : 'Invalid record';
    throw new StoreRecordMalformedError(lineNumber, reason);
  }
  return toTask(parsed.data);
}

/**
 * Decode a whole store. Blank lines are skipped; any bad record aborts the
 * load, so a partial collection is never returned.
 */
export function decodeStore(content: string): Task[] {
  const tasks: Task[] = [];
  const lines = content.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]!;
    if (!line.trim()) continue;
    tasks.push(decodeRecord(line, i + 1));
  }
  return tasks;
}

// ---------------------------------------------------------------------------
// Encode
// ---------------------------------------------------------------------------

/** Map a task to its on-disk shape with a stable key order */
function toRecord(task: Task): TaskRecord {
  const record: TaskRecord = {
    id: task.id,
    name: task.name,
    status: task.status,
    priority: task.priority,
    created: task.created,
    display_order: task.displayOrder,
    due: task.due,
    updated: task.updated,
    completed: task.completed,
  };

  if (task.project !== undefined) record.project = task.project;
  if (task.contexts?.length) record.contexts = task.contexts;
  if (task.tags?.length) record.tags = task.tags;
  if (task.notes !== undefined) record.notes = task.notes;
  if (task.subtasks?.length) record.subtasks = task.subtasks.map(toRecord);
  if (task.extra !== undefined) record.extra = task.extra;
  if (task.repeat !== undefined) record.repeat = { ...task.repeat };

  return record;
}

/** One compact JSON object per line, newline-terminated when non-empty */
export function encodeStore(tasks: readonly Task[]): string {
  if (tasks.length === 0) return '';
  return tasks.map(t => JSON.stringify(toRecord(t))).join('\n') + '\n';
}

// ---------------------------------------------------------------------------
// File-backed store
// ---------------------------------------------------------------------------

export class TaskStore {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  /** Load every record. A missing file is an empty store. */
  load(): Task[] {
    if (!existsSync(this.path)) return [];
    return decodeStore(readFileSync(this.path, 'utf8'));
  }

  /** Replace the file with the given collection */
  save(tasks: readonly Task[]): void {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, encodeStore(tasks), 'utf8');
  }
}
