import type { Task, CreatedTask, TaskStatus } from '@taskd/core';

/** Wire shape of a task; every key is always present */
export interface TaskResponse {
  task_id: number;
  title: string;
  description: string | null;
  assignee: string | null;
  due_date: string | null;
  status: TaskStatus;
  suggested_instructions: string | null;
  created_at: string;
  updated_at: string | null;
}

export interface CreateTaskResponse {
  task_id: number;
  created_at: string;
}

export function toTaskResponse(task: Task): TaskResponse {
  return {
    task_id: task.taskId,
    title: task.title,
    description: task.description,
    assignee: task.assignee,
    due_date: task.dueDate,
    status: task.status,
    suggested_instructions: task.suggestedInstructions,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
  };
}

export function toCreateTaskResponse(created: CreatedTask): CreateTaskResponse {
  return { task_id: created.taskId, created_at: created.createdAt };
}
