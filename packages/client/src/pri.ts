/**
 * SYSLOG severity and facility values, their names, and PRI encoding.
 */

import { ParseError } from './errors.js';

// ─── Severity ────────────────────────────────────────────────────────────────

export const Severity = {
	Emerg: 0,
	Alert: 1,
	Crit: 2,
	Err: 3,
	Warning: 4,
	Notice: 5,
	Info: 6,
	Debug: 7,
} as const;

/** SYSLOG severity value. The valid range is [0,7]. */
export type Severity = (typeof Severity)[keyof typeof Severity];

const SEVERITY_NAMES: readonly string[] = [
	'emerg',
	'alert',
	'crit',
	'err',
	'warning',
	'notice',
	'info',
	'debug',
];

const SEVERITY_ALIASES: Record<string, Severity> = {
	emergency: Severity.Emerg,
	emerg: Severity.Emerg,
	alert: Severity.Alert,
	critical: Severity.Crit,
	crit: Severity.Crit,
	error: Severity.Err,
	err: Severity.Err,
	warning: Severity.Warning,
	warn: Severity.Warning,
	notice: Severity.Notice,
	info: Severity.Info,
	debug: Severity.Debug,
};

// ─── Facility ────────────────────────────────────────────────────────────────

export const Facility = {
	Kern: 0,
	User: 1,
	Mail: 2,
	Daemon: 3,
	Auth: 4,
	Syslog: 5,
	Lpr: 6,
	News: 7,
	Uucp: 8,
	Cron: 9,
	AuthPriv: 10,
	Ftp: 11,
	Ntp: 12, // not universally supported
	LogAudit: 13, // not universally supported
	LogAlert: 14, // not universally supported
	Clock: 15, // not universally supported
	Local0: 16,
	Local1: 17,
	Local2: 18,
	Local3: 19,
	Local4: 20,
	Local5: 21,
	Local6: 22,
	Local7: 23,
} as const;

/** SYSLOG facility value. The valid range is [0,23]. */
export type Facility = (typeof Facility)[keyof typeof Facility];

const FACILITY_NAMES: readonly string[] = [
	'kern',
	'user',
	'mail',
	'daemon',
	'auth',
	'syslog',
	'lpr',
	'news',
	'uucp',
	'cron',
	'authpriv',
	'ftp',
	'ntp',
	'logaudit',
	'logalert',
	'clock',
	'local0',
	'local1',
	'local2',
	'local3',
	'local4',
	'local5',
	'local6',
	'local7',
];

const FACILITY_ALIASES: Record<string, Facility> = { kernel: Facility.Kern };

// ─── Parsing ─────────────────────────────────────────────────────────────────

/**
 * Outcome of parsing a name. On failure `value` still holds the documented
 * fallback so callers can log best-effort, but it carries no meaning:
 * branch on `ok`.
 */
export type ParseResult<T> = { ok: true; value: T } | { ok: false; value: T; error: ParseError };

/** Case-insensitively parse a severity name. Falls back to Debug. */
export function parseSeverity(name: string): ParseResult<Severity> {
	const key = name.toLowerCase();
	const value = Object.hasOwn(SEVERITY_ALIASES, key) ? SEVERITY_ALIASES[key] : undefined;
	if (value === undefined) {
		return { ok: false, value: Severity.Debug, error: new ParseError('severity', name) };
	}
	return { ok: true, value };
}

/** Case-insensitively parse a facility name. Falls back to Local7. */
export function parseFacility(name: string): ParseResult<Facility> {
	const key = name.toLowerCase();
	const index = FACILITY_NAMES.indexOf(key);
	if (index >= 0) {
		return { ok: true, value: toFacility(index) };
	}
	const alias = Object.hasOwn(FACILITY_ALIASES, key) ? FACILITY_ALIASES[key] : undefined;
	if (alias !== undefined) {
		return { ok: true, value: alias };
	}
	return { ok: false, value: Facility.Local7, error: new ParseError('facility', name) };
}

export function severityName(severity: Severity): string {
	return SEVERITY_NAMES[severity & 7];
}

export function facilityName(facility: Facility): string {
	return FACILITY_NAMES[facility] ?? `facility${facility}`;
}

/** All severity names in numeric order */
export function severityNames(): readonly string[] {
	return SEVERITY_NAMES;
}

/** All facility names in numeric order */
export function facilityNames(): readonly string[] {
	return FACILITY_NAMES;
}

function toFacility(index: number): Facility {
	const found = Object.values(Facility).find((value) => value === index);
	return found ?? Facility.Local7;
}

// ─── PRI ─────────────────────────────────────────────────────────────────────

/** PRI = (severity & 7) | ((facility & 31) << 3) */
export function makePri(severity: Severity, facility: Facility): number {
	return (severity & 7) | ((facility & 31) << 3);
}
