export { TaskService, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from './task-service.js';
