/** Outcome of a task operation, shared by input parsing and the task service */
export type ServiceResult<T> =
  | { readonly type: 'success'; readonly data: T }
  | { readonly type: 'invalid'; readonly message: string }
  | { readonly type: 'invalid-status'; readonly message: string }
  | { readonly type: 'not-found'; readonly message: string }
  | { readonly type: 'error'; readonly message: string };

export type ServiceFailure = Exclude<ServiceResult<never>, { type: 'success' }>;

export const Messages = {
  InvalidStatus: 'Invalid status value',
  NotFound: 'Task not found',
  Internal: 'Internal Server Error',
  NonPositiveId: 'task_id must be positive',
  EmptyPatch: 'At least one field must be provided for update',
  EmptyUsername: 'Username must be a non-empty string',
  InvalidPagination: 'Invalid pagination parameters',
} as const;

export function success<T>(data: T): ServiceResult<T> {
  return { type: 'success', data };
}

export function invalid(message: string): ServiceFailure {
  return { type: 'invalid', message };
}

export function notFound(): ServiceFailure {
  return { type: 'not-found', message: Messages.NotFound };
}

export function internalError(): ServiceFailure {
  return { type: 'error', message: Messages.Internal };
}

