// Task helpers
export { toTask, nextTimestamp, lastStamp, hasText } from './task-helpers.js';

// Task queries
export {
  getTaskById,
  getTasksByAssignee,
  insertTask,
  updateTask,
  setSuggestedInstructions,
  deleteTask,
} from './task-queries.js';
export type { InstructionWrite } from './task-queries.js';
