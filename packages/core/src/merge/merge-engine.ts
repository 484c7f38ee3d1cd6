/**
 * Folds an edited markdown forest back into the stored task collection.
 *
 * Policy per top-level id:
 * - in both: editable fields come from the document (absent there means
 *   absent here); id, created, extra and repeat are kept from the store.
 * - only in the document: added as parsed.
 * - only in the store: dropped.
 * Every kept or added task gets `updated` = today. Subtasks are replaced
 * wholesale by the document's subtree.
 */

import type { IsoDate, Task, TaskId } from '../types/task.js';

export interface MergeOptions {
  /** Processing date stamped into `updated` */
  readonly today: IsoDate;
}

export interface MergeResult {
  /** New collection, ordered and renumbered 1..N */
  readonly tasks: Task[];
  readonly added: TaskId[];
  readonly updated: TaskId[];
  readonly removed: TaskId[];
}

/** Fields the markdown form owns; everything here is replaced on merge */
function editableFields(doc: Task): Omit<Task, 'id' | 'created' | 'extra' | 'repeat'> {
  return {
    name: doc.name,
    status: doc.status,
    priority: doc.priority,
    displayOrder: doc.displayOrder,
    due: doc.due,
    updated: doc.updated,
    completed: doc.completed,
    ...(doc.project !== undefined ? { project: doc.project } : {}),
    ...(doc.contexts !== undefined ? { contexts: doc.contexts } : {}),
    ...(doc.tags !== undefined ? { tags: doc.tags } : {}),
    ...(doc.notes !== undefined ? { notes: doc.notes } : {}),
    ...(doc.subtasks !== undefined ? { subtasks: doc.subtasks } : {}),
  };
}

/** Apply the document's version of a task on top of the stored one */
function mergeTask(stored: Task, doc: Task, today: IsoDate): Task {
  return {
    id: stored.id,
    created: stored.created,
    ...editableFields(doc),
    updated: today,
    ...(stored.extra !== undefined ? { extra: stored.extra } : {}),
    ...(stored.repeat !== undefined ? { repeat: stored.repeat } : {}),
  };
}

/**
 * Merge a freshly parsed forest into the previous collection.
 * Neither input is mutated.
 */
export function mergeTasks(
  previous: readonly Task[],
  incoming: readonly Task[],
  opts: MergeOptions,
): MergeResult {
  const byId = new Map<TaskId, Task>();
  for (const task of previous) byId.set(task.id, task);

  const merged: Task[] = [];
  const added: TaskId[] = [];
  const updated: TaskId[] = [];
  const seen = new Set<TaskId>();

  for (const doc of incoming) {
    seen.add(doc.id);
    const stored = byId.get(doc.id);
    if (stored) {
      // A duplicated id in the document only matches the store once
      byId.delete(doc.id);
      merged.push(mergeTask(stored, doc, opts.today));
      updated.push(doc.id);
    } else {
      merged.push({ ...doc, updated: opts.today });
      added.push(doc.id);
    }
  }

  const removed = previous.map(t => t.id).filter(id => !seen.has(id));

  const tasks = merged
    .map((task, index) => ({ task, index }))
    .sort((a, b) => a.task.displayOrder - b.task.displayOrder || a.index - b.index)
    .map(({ task }, i) => ({ ...task, displayOrder: i + 1 }));

  return { tasks, added, updated, removed };
}
