export const TaskStatus = {
  None: 'none',
  Pending: 'pending',
  Doing: 'doing',
  Waiting: 'waiting',
  Done: 'done',
  Cancelled: 'cancelled',
  Unknown: 'unknown',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

/** Checkbox character written between the brackets of a task line */
export const TaskStatusMarker: Record<TaskStatus, string> = {
  [TaskStatus.None]: ' ',
  [TaskStatus.Pending]: 'p',
  [TaskStatus.Doing]: '>',
  [TaskStatus.Waiting]: 'w',
  [TaskStatus.Done]: 'x',
  [TaskStatus.Cancelled]: 'c',
  [TaskStatus.Unknown]: '?',
};

/** Map a checkbox character to a status. Unrecognized characters are `unknown`. */
export function statusFromMarker(marker: string): TaskStatus {
  switch (marker.toLowerCase()) {
    case ' ': return TaskStatus.None;
    case 'p': return TaskStatus.Pending;
    case '>': return TaskStatus.Doing;
    case 'w': return TaskStatus.Waiting;
    case 'x': return TaskStatus.Done;
    case 'c': return TaskStatus.Cancelled;
    default: return TaskStatus.Unknown;
  }
}

/**
 * Map a status word to a status, or null if the word is not one.
 * "open" is accepted as an alias of "none".
 */
export function statusFromWord(word: string): TaskStatus | null {
  switch (word.toLowerCase()) {
    case 'none': case 'open': return TaskStatus.None;
    case 'pending': return TaskStatus.Pending;
    case 'doing': return TaskStatus.Doing;
    case 'waiting': return TaskStatus.Waiting;
    case 'done': return TaskStatus.Done;
    case 'cancelled': return TaskStatus.Cancelled;
    case 'unknown': return TaskStatus.Unknown;
    default: return null;
  }
}
