export { ConsoleLogger, createLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
