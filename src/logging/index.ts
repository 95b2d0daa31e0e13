export { Logger, LOG_LEVELS, isLogLevel } from './logger.js';
export type { LogLevel, LoggerOptions } from './logger.js';
