import { describe, it, expect } from 'vitest';
import { TASK_STATUSES, isTaskStatus, parseTaskStatus } from '../../src/types/task-status.js';

describe('task status', () => {
  it('lists the three wire values', () => {
    expect(TASK_STATUSES).toEqual(['not_started', 'in_progress', 'completed']);
  });

  it.each(['not_started', 'in_progress', 'completed'])('accepts %s', (value) => {
    expect(isTaskStatus(value)).toBe(true);
    expect(parseTaskStatus(value)).toBe(value);
  });

  it.each(['Completed', 'done', '', 1, null])('rejects %j', (value) => {
    expect(isTaskStatus(value)).toBe(false);
    expect(parseTaskStatus(value)).toBeNull();
  });
});
