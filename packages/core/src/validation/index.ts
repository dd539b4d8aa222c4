export { parseCreateTask, parseUpdateTask, parseTaskId, parseListQuery } from './task-input.js';
export type { ParseResult, UnprocessableResult, ListQuery } from './task-input.js';
