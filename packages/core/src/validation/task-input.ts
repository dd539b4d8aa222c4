/**
 * Parsing boundary for task requests. Wire payloads (snake_case JSON, query
 * strings, path segments) become typed inputs here; an unknown status is
 * rejected before anything reaches the task service.
 */

import { z } from 'zod';
import type { NewTask, TaskPatch, TaskId } from '../types/task.js';
import type { ServiceResult } from '../types/results.js';
import { Messages, success } from '../types/results.js';
import { parseTaskStatus, type TaskStatus } from '../types/task-status.js';

const isoTimestamp = z.string().refine(v => !Number.isNaN(Date.parse(v)), 'must be an ISO-8601 timestamp');

const createTaskSchema = z.object({
  title: z.string({ required_error: 'field required' }),
  description: z.string().nullish(),
  assignee: z.string().nullish(),
  due_date: isoTimestamp.nullish(),
  status: z.string().nullish(),
});

const updateTaskSchema = z.object({
  title: z.string().optional(),
  description: z.string().nullish(),
  assignee: z.string().nullish(),
  due_date: isoTimestamp.nullish(),
  status: z.string().nullish(),
});

/** A request the parsing boundary rejected with a 422 */
export type UnprocessableResult = { readonly type: 'unprocessable'; readonly message: string };

export type ParseResult<T> = ServiceResult<T> | UnprocessableResult;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}

function unprocessable(message: string): UnprocessableResult {
  return { type: 'unprocessable', message };
}

function parseStatusField(raw: string | null | undefined): TaskStatus | undefined | false {
  if (raw == null) return undefined;
  return parseTaskStatus(raw) ?? false;
}

export function parseCreateTask(body: unknown): ParseResult<NewTask> {
  const parsed = createTaskSchema.safeParse(body);
  if (!parsed.success) return unprocessable(describeIssues(parsed.error));

  const status = parseStatusField(parsed.data.status);
  if (status === false) return { type: 'invalid-status', message: Messages.InvalidStatus };

  const { title, description, assignee, due_date } = parsed.data;
  return success({
    title,
    description: description ?? null,
    assignee: assignee ?? null,
    dueDate: due_date ?? null,
    ...(status !== undefined && { status }),
  });
}

export function parseUpdateTask(body: unknown): ParseResult<TaskPatch> {
  const parsed = updateTaskSchema.safeParse(body);
  if (!parsed.success) return unprocessable(describeIssues(parsed.error));

  if (parsed.data.status === null) return { type: 'invalid-status', message: Messages.InvalidStatus };
  const status = parseStatusField(parsed.data.status);
  if (status === false) return { type: 'invalid-status', message: Messages.InvalidStatus };

  const { title, description, assignee, due_date } = parsed.data;
  const patch: TaskPatch = {
    ...(title !== undefined && { title }),
    // null clears the field, undefined leaves it alone
    ...(description !== undefined && { description }),
    ...(assignee !== undefined && { assignee }),
    ...(due_date !== undefined && { dueDate: due_date }),
    ...(status !== undefined && { status }),
  };
  return success(patch);
}

/** Path segment to task id. Sign is checked by the service, not here */
export function parseTaskId(segment: string): ParseResult<TaskId> {
  const taskId = /^-?\d+$/.test(segment) ? Number(segment) : Number.NaN;
  if (!Number.isSafeInteger(taskId)) return unprocessable('task_id must be an integer');
  return success(taskId);
}

export interface ListQuery {
  readonly assignee: string;
  readonly limit: number;
  readonly offset: number;
}

/**
 * Query string to list arguments. Malformed numbers come through as NaN so
 * the service reports them as invalid pagination.
 */
export function parseListQuery(params: URLSearchParams, defaultLimit: number): ListQuery {
  const toInt = (raw: string | null, fallback: number): number =>
    raw === null || raw === '' ? fallback : /^-?\d+$/.test(raw.trim()) ? Number(raw) : Number.NaN;

  return {
    assignee: params.get('username') ?? '',
    limit: toInt(params.get('limit'), defaultLimit),
    offset: toInt(params.get('offset'), 0),
  };
}
