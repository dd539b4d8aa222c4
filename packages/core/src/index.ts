// Types
export * from './types/index.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, createTestDb, getDefaultDbPath, getRawDb, atomic, closeDb, CREATE_SCHEMA_SQL } from './db.js';
export type { TaskdDb } from './db.js';

// Queries
export * from './queries/index.js';

// Store
export { SqliteTaskStore } from './store/task-store.js';
export type { TaskStore, TaskStoreOptions } from './store/task-store.js';

// Errors
export { StoreError, ConfigError, InstructionBackendError, errorMessage } from './errors/index.js';

// Logging
export * from './logger/index.js';

// Configuration
export * from './config/index.js';

// Enrichment
export * from './enrichment/index.js';

// Service
export * from './service/index.js';

// Request parsing
export * from './validation/index.js';
