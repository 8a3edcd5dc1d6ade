/**
 * @syslogkit/sdk: shared interfaces for syslogkit loggers.
 */

export type { DurationString, LogLevel, LogLevelName, LogRecord } from './types.js';
export { levelName, LogLevels, parseDuration } from './types.js';

export type { Logger, LoggerRegistration } from './logger.js';
