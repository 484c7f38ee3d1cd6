import type { TaskStatus } from './task-status.js';
import type { Priority } from './priority.js';

export type TaskId = number;

/** Calendar date as yyyy-MM-dd */
export type IsoDate = string;

/** Reserved for recurrence rules; carried through untouched */
export type RepeatRule = Readonly<Record<string, unknown>>;

export interface Task {
  readonly id: TaskId;
  readonly name: string;
  readonly status: TaskStatus;
  readonly priority: Priority;
  readonly created: IsoDate;
  readonly displayOrder: number;

  // Key always present, value nullable
  readonly due: IsoDate | null;
  readonly updated: IsoDate | null;
  readonly completed: IsoDate | null;

  // Removed entirely when absent
  readonly project?: string;
  readonly contexts?: string[];
  readonly tags?: string[];
  readonly notes?: string;
  readonly subtasks?: Task[];

  // Store-only; the markdown form never reads or writes these
  readonly extra?: Record<string, unknown>;
  readonly repeat?: RepeatRule;
}
