export { logger, createServiceLogger, setLogLevel, log, LOG_LEVELS } from './logger.js';
export type { ServiceLogger, LogLevel } from './logger.js';
