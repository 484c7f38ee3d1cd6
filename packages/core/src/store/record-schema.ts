/**
 * Zod schema for one stored task record (one JSONL line).
 * Older stores wrote `null` for absent optional keys, empty arrays and
 * uppercase status words; all of those are accepted here.
 */

import { z } from 'zod';
import { statusFromWord } from '../types/task-status.js';
import { isIsoDate } from '../parsers/date-parser.js';

/** On-disk shape of a task; unknown keys are kept for the `extra` fold */
export interface TaskRecord {
  id: number;
  name: string;
  status: string;
  priority: string;
  created: string;
  display_order: number;
  due?: string | null;
  updated?: string | null;
  completed?: string | null;
  project?: string | null;
  contexts?: string[] | null;
  tags?: string[] | null;
  notes?: string | null;
  subtasks?: TaskRecord[] | null;
  extra?: Record<string, unknown> | null;
  repeat?: Record<string, unknown> | null;
  [key: string]: unknown;
}

/** Keys with a meaning of their own; anything else belongs in `extra` */
export const RECORD_KEYS: ReadonlySet<string> = new Set([
  'id', 'name', 'status', 'priority', 'created', 'display_order',
  'due', 'updated', 'completed',
  'project', 'contexts', 'tags', 'notes', 'subtasks', 'extra', 'repeat',
]);

const isoDate = z.string().refine(isIsoDate, { message: 'Expected a yyyy-MM-dd date' });
const nullableDate = isoDate.nullable().optional();

export const taskRecordSchema: z.ZodType<TaskRecord> = z.lazy(() =>
  z.object({
    id: z.number().int().positive(),
    name: z.string(),
    status: z.string().refine(s => statusFromWord(s) != null, { message: 'Unknown status' }),
    priority: z.string().min(1),
    created: isoDate,
    display_order: z.number().int().positive(),
    due: nullableDate,
    updated: nullableDate,
    completed: nullableDate,
    project: z.string().nullable().optional(),
    contexts: z.array(z.string()).nullable().optional(),
    tags: z.array(z.string()).nullable().optional(),
    notes: z.string().nullable().optional(),
    subtasks: z.array(taskRecordSchema).nullable().optional(),
    extra: z.record(z.string(), z.unknown()).nullable().optional(),
    repeat: z.record(z.string(), z.unknown()).nullable().optional(),
  }).passthrough(),
);
