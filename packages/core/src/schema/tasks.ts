import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { TaskStatus } from '../types/task-status.js';

export const tasks = sqliteTable('tasks', {
  taskId: integer('task_id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  description: text('description'),
  assignee: text('assignee'),
  dueDate: text('due_date'),
  status: text('status').$type<TaskStatus>().notNull().default('not_started'),
  /** Flattened instructions, written by enrichment only */
  suggestedInstructions: text('suggested_instructions'),
  createdAt: text('created_at').notNull(),
  /** Null until the first mutation */
  updatedAt: text('updated_at'),
}, (table) => [
  index('idx_tasks_assignee').on(table.assignee),
]);

export type TaskRow = typeof tasks.$inferSelect;
