export const TaskStatus = {
  NotStarted: 'not_started',
  InProgress: 'in_progress',
  Completed: 'completed',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

export const TASK_STATUSES: readonly TaskStatus[] = Object.values(TaskStatus);

export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === 'string' && TASK_STATUSES.some(s => s === value);
}

/** Parse a wire value into a TaskStatus, or null when it is not one */
export function parseTaskStatus(value: unknown): TaskStatus | null {
  return isTaskStatus(value) ? value : null;
}
