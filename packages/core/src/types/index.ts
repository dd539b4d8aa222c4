export { TaskStatus, TASK_STATUSES, isTaskStatus, parseTaskStatus } from './task-status.js';
export type { TaskId, Task, NewTask, TaskPatch, CreatedTask, TaskSnapshot } from './task.js';
export type { ServiceResult, ServiceFailure } from './results.js';
export { Messages, success, invalid, notFound, internalError } from './results.js';
