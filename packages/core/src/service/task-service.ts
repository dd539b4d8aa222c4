import type { Logger } from '../logger/index.js';
import type { TaskStore } from '../store/task-store.js';
import type { EnrichmentQueue } from '../enrichment/enrichment-queue.js';
import type { Task, TaskId, NewTask, TaskPatch, CreatedTask } from '../types/task.js';
import type { ServiceResult } from '../types/results.js';
import { Messages, success, invalid, notFound, internalError } from '../types/results.js';
import { hasText } from '../queries/task-helpers.js';
import { errorMessage } from '../errors/index.js';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;
/** Largest offset SQLite binds as an integer; anything past it is an empty page */
const MAX_OFFSET = Number.MAX_SAFE_INTEGER;

function isPositiveId(taskId: TaskId): boolean {
  return Number.isInteger(taskId) && taskId > 0;
}

function isEmptyPatch(patch: TaskPatch): boolean {
  return Object.values(patch).every(v => v === undefined);
}

/**
 * Request-level contract for tasks. Validates, persists through the store,
 * then hands (task_id, title, description) to the enrichment queue without
 * waiting on it.
 */
export class TaskService {
  private readonly store: TaskStore;
  private readonly enrichment: EnrichmentQueue;
  private readonly logger: Logger;

  constructor(store: TaskStore, enrichment: EnrichmentQueue, logger: Logger) {
    this.store = store;
    this.enrichment = enrichment;
    this.logger = logger;
  }

  create(input: NewTask): ServiceResult<CreatedTask> {
    let task: Task;
    try {
      task = this.store.insert(input);
    } catch (err: unknown) {
      return this.fail('create task', err);
    }

    this.logger.info(`Created task ${task.taskId}`);
    this.scheduleEnrichment(task);
    return success({ taskId: task.taskId, createdAt: task.createdAt });
  }

  get(taskId: TaskId): ServiceResult<Task> {
    if (!isPositiveId(taskId)) return invalid(Messages.NonPositiveId);

    try {
      const task = this.store.findById(taskId);
      return task ? success(task) : notFound();
    } catch (err: unknown) {
      return this.fail(`fetch task ${taskId}`, err);
    }
  }

  list(assignee: string, limit: number = DEFAULT_PAGE_SIZE, offset: number = 0): ServiceResult<Task[]> {
    if (!hasText(assignee)) return invalid(Messages.EmptyUsername);
    if (!Number.isInteger(limit) || limit < 0 || limit > MAX_PAGE_SIZE
      || !Number.isInteger(offset) || offset < 0) {
      return invalid(Messages.InvalidPagination);
    }

    try {
      return success(this.store.listByAssignee(assignee.trim(), limit, Math.min(offset, MAX_OFFSET)));
    } catch (err: unknown) {
      return this.fail(`list tasks for ${assignee}`, err);
    }
  }

  update(taskId: TaskId, patch: TaskPatch): ServiceResult<Task> {
    if (!isPositiveId(taskId)) return invalid(Messages.NonPositiveId);
    if (isEmptyPatch(patch)) return invalid(Messages.EmptyPatch);

    let task: Task | null;
    try {
      task = this.store.update(taskId, patch);
    } catch (err: unknown) {
      return this.fail(`update task ${taskId}`, err);
    }
    if (!task) return notFound();

    this.logger.info(`Updated task ${taskId}`);
    this.scheduleEnrichment(task);
    return success(task);
  }

  delete(taskId: TaskId): ServiceResult<null> {
    if (!isPositiveId(taskId)) return invalid(Messages.NonPositiveId);

    try {
      if (!this.store.delete(taskId)) return notFound();
    } catch (err: unknown) {
      return this.fail(`delete task ${taskId}`, err);
    }

    this.logger.info(`Deleted task ${taskId}`);
    return success(null);
  }

  /** Best effort: a failure here is logged and never changes the response */
  private scheduleEnrichment(task: Task): void {
    if (!hasText(task.title) || !hasText(task.description)) {
      this.logger.warn(`Instruction generation not scheduled for task ${task.taskId}: title and description are required`);
      return;
    }

    try {
      this.enrichment.submit({ taskId: task.taskId, title: task.title, description: task.description });
    } catch (err: unknown) {
      this.logger.error(`Failed to schedule instruction generation for task ${task.taskId}: ${errorMessage(err)}`, err);
    }
  }

  private fail(operation: string, err: unknown): ServiceResult<never> {
    this.logger.error(`Failed to ${operation}`, err);
    return internalError();
  }
}
