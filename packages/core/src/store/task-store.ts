import type { TaskdDb } from '../db.js';
import { atomic } from '../db.js';
import type { Task, TaskId, NewTask, TaskPatch, TaskSnapshot } from '../types/task.js';
import type { InstructionWrite } from '../queries/task-queries.js';
import {
  getTaskById,
  getTasksByAssignee,
  insertTask,
  updateTask,
  setSuggestedInstructions,
  deleteTask,
} from '../queries/task-queries.js';
import { StoreError } from '../errors/index.js';

/**
 * Persistence contract for task rows. Every call is atomic; a failure is
 * rolled back and surfaces as StoreError.
 */
export interface TaskStore {
  insert(input: NewTask): Task;
  findById(taskId: TaskId): Task | null;
  listByAssignee(assignee: string, limit: number, offset: number): Task[];
  /** Returns null when the task does not exist */
  update(taskId: TaskId, patch: TaskPatch): Task | null;
  setSuggestedInstructions(taskId: TaskId, instructions: string, expected?: TaskSnapshot): InstructionWrite;
  /** Returns false when the task does not exist */
  delete(taskId: TaskId): boolean;
}

export interface TaskStoreOptions {
  now?: () => Date;
}

export class SqliteTaskStore implements TaskStore {
  private readonly db: TaskdDb;
  private readonly now: () => Date;

  constructor(db: TaskdDb, options: TaskStoreOptions = {}) {
    this.db = db;
    this.now = options.now ?? (() => new Date());
  }

  insert(input: NewTask): Task {
    return this.run('insert', () => insertTask(this.db, input, this.now()));
  }

  findById(taskId: TaskId): Task | null {
    return this.run('findById', () => getTaskById(this.db, taskId));
  }

  listByAssignee(assignee: string, limit: number, offset: number): Task[] {
    return this.run('listByAssignee', () => getTasksByAssignee(this.db, assignee, limit, offset));
  }

  update(taskId: TaskId, patch: TaskPatch): Task | null {
    return this.run('update', () => updateTask(this.db, taskId, patch, this.now()));
  }

  setSuggestedInstructions(taskId: TaskId, instructions: string, expected?: TaskSnapshot): InstructionWrite {
    return this.run('setSuggestedInstructions', () =>
      setSuggestedInstructions(this.db, taskId, instructions, this.now(), expected));
  }

  delete(taskId: TaskId): boolean {
    return this.run('delete', () => deleteTask(this.db, taskId));
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return atomic(this.db, fn);
    } catch (err: unknown) {
      throw new StoreError(operation, { cause: err });
    }
  }
}
