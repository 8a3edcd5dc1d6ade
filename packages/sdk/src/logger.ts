/**
 * Logger plugin interface.
 */

import type { LogRecord } from './types.js';

/** A log sink. Implementations are created by the host and initialised once. */
export interface Logger {
	readonly id: string;
	init(config: Record<string, unknown>): Promise<void>;
	log(record: LogRecord): Promise<void>;
	flush(): Promise<void>;
	shutdown(): Promise<void>;
}

/** What a logger package's `register()` returns */
export interface LoggerRegistration {
	id: string;
	logger: new () => Logger;
	/** JSON Schema for the logger's `config` block */
	configSchema?: Record<string, unknown>;
}
