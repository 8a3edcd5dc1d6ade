/**
 * Core type definitions for syslogkit.
 *
 * These types describe the log records handed to logger plugins. The
 * record is fully resolved by the caller: the plugin only encodes it.
 */

// ─── Log Levels ──────────────────────────────────────────────────────────────

/**
 * Numeric log level. Higher is more severe; the named levels sit four
 * apart so intermediate values (e.g. 2 for "notice") remain expressible.
 */
export type LogLevel = number;

export const LogLevels = {
	debug: -4,
	info: 0,
	warn: 4,
	error: 8,
} as const;

export type LogLevelName = keyof typeof LogLevels;

/** Render a level as its nearest name with an offset, e.g. `INFO+2` */
export function levelName(level: LogLevel): string {
	const named: [LogLevelName, number][] = [
		['error', LogLevels.error],
		['warn', LogLevels.warn],
		['info', LogLevels.info],
		['debug', LogLevels.debug],
	];
	for (const [name, value] of named) {
		if (level >= value || name === 'debug') {
			const delta = level - value;
			const base = name.toUpperCase();
			if (delta === 0) return base;
			return delta > 0 ? `${base}+${delta}` : `${base}${delta}`;
		}
	}
	return String(level);
}

// ─── Log Record ──────────────────────────────────────────────────────────────

/** Universal log record; every logger receives this */
export interface LogRecord {
	/** When the record was produced */
	time: Date;
	/** Record level (see LogLevels) */
	level: LogLevel;
	/** Human-readable message */
	message: string;
	/** Short machine-readable identifier for the kind of record (e.g. "conn.lost") */
	id?: string;
	/** Resolved key/value attributes */
	attrs?: Record<string, unknown>;
}

// ─── Utilities ────────────────────────────────────────────────────────────────

/** Duration string (e.g., "500ms", "30s", "2m") */
export type DurationString = string;

/** Parse a duration string to milliseconds */
export function parseDuration(duration: DurationString): number {
	const match = duration.match(/^(\d+)(ms|s|m|h|d)$/);
	if (!match) {
		throw new Error(
			`Invalid duration format: "${duration}". Expected format: <number><unit> (e.g., 500ms, 5s, 2m)`,
		);
	}
	const value = Number.parseInt(match[1], 10);
	const unit = match[2];
	switch (unit) {
		case 'ms':
			return value;
		case 's':
			return value * 1000;
		case 'm':
			return value * 60 * 1000;
		case 'h':
			return value * 60 * 60 * 1000;
		case 'd':
			return value * 24 * 60 * 60 * 1000;
		default:
			throw new Error(`Unknown duration unit: ${unit}`);
	}
}
