import type { TaskId } from '../types/task.js';

/**
 * Hands out task ids for one document.
 * Explicit ids are reserved up front; automatic ids fill the smallest gaps.
 */
export class IdAllocator {
  private readonly used = new Set<TaskId>();
  private cursor = 1;

  constructor(reserved: Iterable<TaskId> = []) {
    for (const id of reserved) this.used.add(id);
  }

  /** Mark an id as taken. Reserving an id twice is allowed. */
  reserve(id: TaskId): void {
    this.used.add(id);
  }

  has(id: TaskId): boolean {
    return this.used.has(id);
  }

  /** Smallest positive id not yet taken, which is then reserved */
  next(): TaskId {
    while (this.used.has(this.cursor)) this.cursor++;
    const id = this.cursor;
    this.used.add(id);
    return id;
  }
}
