/**
 * Renders tasks back to markdown lines, the inverse of the line grammar.
 * Attribute order: id due +project @contexts #tags created updated completed note
 */

import type { Task } from '../types/task.js';
import { TaskStatusMarker } from '../types/task-status.js';
import { DEFAULT_INDENT_WIDTH } from '../config.js';
import { EMPTY_VALUE } from '../parsers/attribute-grammar.js';

export interface FormatOptions {
  readonly indentWidth?: number;
}

function nullableDate(key: string, value: string | null): string {
  return `${key}:${value ?? EMPTY_VALUE}`;
}

/** Format one task line without indentation or the leading "- " */
export function formatTaskLine(task: Task): string {
  const parts: string[] = [`id:${task.id}`, nullableDate('due', task.due)];

  if (task.project) parts.push(`+${task.project}`);
  if (task.contexts?.length) parts.push(...task.contexts.map(c => `@${c}`));
  if (task.tags?.length) parts.push(...task.tags.map(t => `#${t}`));

  parts.push(`created:${task.created}`);
  parts.push(nullableDate('updated', task.updated));
  parts.push(nullableDate('completed', task.completed));

  if (task.notes != null) parts.push(`note:"${task.notes.replace(/"/g, '""')}"`);

  return `[${TaskStatusMarker[task.status]}] (${task.priority}) [[${task.name}]] ${parts.join(' ')}`;
}

function formatTree(task: Task, depth: number, indentWidth: number, lines: string[]): void {
  lines.push(`${' '.repeat(depth * indentWidth)}- ${formatTaskLine(task)}`);
  for (const sub of task.subtasks ?? []) {
    formatTree(sub, depth + 1, indentWidth, lines);
  }
}

/** Render a forest as a markdown document (no trailing newline) */
export function formatDocument(tasks: readonly Task[], opts: FormatOptions = {}): string {
  const indentWidth = opts.indentWidth ?? DEFAULT_INDENT_WIDTH;
  const lines: string[] = [];
  for (const task of tasks) {
    formatTree(task, 0, indentWidth, lines);
  }
  return lines.join('\n');
}
