import type { Task } from '../types/task.js';
import type { TaskRow } from '../schema/tasks.js';

/** Map a Drizzle row to a Task object */
export function toTask(row: TaskRow): Task {
  return { ...row };
}

/**
 * Timestamp for a mutation: the current time, bumped past the previous stamp
 * so updated_at never repeats or goes backwards on a coarse clock.
 */
export function nextTimestamp(now: Date, previous: string): string {
  const prev = Date.parse(previous);
  const at = Number.isNaN(prev) ? now.getTime() : Math.max(now.getTime(), prev + 1);
  return new Date(at).toISOString();
}

/** The stamp a row's next mutation must exceed */
export function lastStamp(task: Pick<Task, 'createdAt' | 'updatedAt'>): string {
  return task.updatedAt ?? task.createdAt;
}

/** True when the string has visible characters */
export function hasText(value: string | null | undefined): value is string {
  return value != null && value.trim().length > 0;
}
