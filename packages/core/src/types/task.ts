import type { TaskStatus } from './task-status.js';

export type TaskId = number;

export interface Task {
  readonly taskId: TaskId;
  readonly title: string;
  readonly description: string | null;
  readonly assignee: string | null;
  readonly dueDate: string | null; // ISO string, as supplied
  readonly status: TaskStatus;
  /** "; "-joined instructions, written only by enrichment */
  readonly suggestedInstructions: string | null;
  readonly createdAt: string; // ISO string
  readonly updatedAt: string | null; // ISO string, null until first mutation
}

export interface NewTask {
  readonly title: string;
  readonly description?: string | null;
  readonly assignee?: string | null;
  readonly dueDate?: string | null;
  readonly status?: TaskStatus;
}

/** Fields a client may change; suggestedInstructions is deliberately absent */
export interface TaskPatch {
  readonly title?: string;
  readonly description?: string | null;
  readonly assignee?: string | null;
  readonly dueDate?: string | null;
  readonly status?: TaskStatus;
}

export interface CreatedTask {
  readonly taskId: TaskId;
  readonly createdAt: string;
}

/** The (title, description) pair an enrichment job was computed from */
export interface TaskSnapshot {
  readonly title: string;
  readonly description: string | null;
}
