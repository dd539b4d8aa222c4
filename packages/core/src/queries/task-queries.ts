/**
 * Task CRUD operations using Drizzle ORM.
 * Each function runs plain statements on the given connection; callers
 * that need atomicity wrap them with `atomic` (see TaskStore).
 */

import { eq, asc } from 'drizzle-orm';
import type { TaskdDb } from '../db.js';
import type { Task, TaskId, NewTask, TaskPatch, TaskSnapshot } from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import { tasks } from '../schema/tasks.js';
import { toTask, nextTimestamp, lastStamp } from './task-helpers.js';

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/** Get a single task by ID */
export function getTaskById(db: TaskdDb, taskId: TaskId): Task | null {
  const row = db.select().from(tasks).where(eq(tasks.taskId, taskId)).get();
  return row ? toTask(row) : null;
}

/** Get one page of the tasks assigned to a user, oldest first */
export function getTasksByAssignee(
  db: TaskdDb,
  assignee: string,
  limit: number,
  offset: number,
): Task[] {
  const rows = db.select().from(tasks)
    .where(eq(tasks.assignee, assignee))
    .orderBy(asc(tasks.taskId))
    .limit(limit)
    .offset(offset)
    .all();
  return rows.map(toTask);
}

// ---------------------------------------------------------------------------
// Write operations
// ---------------------------------------------------------------------------

/** Insert a task and return it with its assigned ID */
export function insertTask(db: TaskdDb, input: NewTask, now: Date): Task {
  const row = db.insert(tasks).values({
    title: input.title,
    description: input.description ?? null,
    assignee: input.assignee ?? null,
    dueDate: input.dueDate ?? null,
    status: input.status ?? TaskStatus.NotStarted,
    createdAt: now.toISOString(),
  }).returning().get();
  return toTask(row);
}

/** Apply a patch to an existing task. Returns null when the task does not exist */
export function updateTask(db: TaskdDb, taskId: TaskId, patch: TaskPatch, now: Date): Task | null {
  const existing = getTaskById(db, taskId);
  if (!existing) return null;

  db.update(tasks).set({
    ...(patch.title !== undefined && { title: patch.title }),
    ...(patch.description !== undefined && { description: patch.description }),
    ...(patch.assignee !== undefined && { assignee: patch.assignee }),
    ...(patch.dueDate !== undefined && { dueDate: patch.dueDate }),
    ...(patch.status !== undefined && { status: patch.status }),
    updatedAt: nextTimestamp(now, lastStamp(existing)),
  }).where(eq(tasks.taskId, taskId)).run();

  return getTaskById(db, taskId);
}

export type InstructionWrite = 'applied' | 'not-found' | 'stale';

/**
 * Store generated instructions on a task. With `expected`, the write only
 * lands if title and description still match the snapshot.
 */
export function setSuggestedInstructions(
  db: TaskdDb,
  taskId: TaskId,
  instructions: string,
  now: Date,
  expected?: TaskSnapshot,
): InstructionWrite {
  const existing = getTaskById(db, taskId);
  if (!existing) return 'not-found';
  if (expected && (existing.title !== expected.title || existing.description !== expected.description)) {
    return 'stale';
  }

  db.update(tasks).set({
    suggestedInstructions: instructions,
    updatedAt: nextTimestamp(now, lastStamp(existing)),
  }).where(eq(tasks.taskId, taskId)).run();
  return 'applied';
}

/** Delete a task permanently. Returns false when nothing was deleted */
export function deleteTask(db: TaskdDb, taskId: TaskId): boolean {
  const result = db.delete(tasks).where(eq(tasks.taskId, taskId)).run();
  return result.changes > 0;
}
