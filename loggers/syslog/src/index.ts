/**
 * @syslogkit/logger-syslog: registration entry point.
 */

import type { LoggerRegistration } from '@syslogkit/sdk';
import { syslogLoggerConfigSchema } from './schema.js';
import { SyslogLogger } from './syslog-logger.js';

export function register(): LoggerRegistration {
	return {
		id: 'syslog',
		logger: SyslogLogger,
		configSchema: syslogLoggerConfigSchema,
	};
}

export type { SyslogLoggerConfig } from './schema.js';
export { syslogLoggerConfigSchema, validateSyslogLoggerConfig } from './schema.js';
export type { SyslogLoggerOptions } from './syslog-logger.js';
export {
	levelToSeverity,
	programName,
	renderBody,
	resolveFacility,
	SyslogLogger,
	toClientConfig,
	toMessage,
} from './syslog-logger.js';
