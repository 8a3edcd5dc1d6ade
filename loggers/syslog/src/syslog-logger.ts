/**
 * Syslog logger: forwards log records to a SYSLOG receiver through
 * SyslogClient. Each record becomes one message whose body is a JSON line.
 */

import { basename, extname } from 'node:path';
import {
	type BackoffPolicy,
	ClosedError,
	ConfigurationError,
	createBackoff,
	type DialFunction,
	type Facility,
	type Message,
	ParseError,
	parseFacility,
	parseTargetSpec,
	type PlatformCapability,
	Severity,
	SyslogClient,
	type SyslogClientConfig,
} from '@syslogkit/client';
import { type LogLevel, LogLevels, type LogRecord, type Logger, levelName } from '@syslogkit/sdk';
import { type SyslogLoggerConfig, validateSyslogLoggerConfig } from './schema.js';

// ─── Severity Mapping ────────────────────────────────────────────────────────

/** Map a record level onto the nearest SYSLOG severity */
export function levelToSeverity(level: LogLevel): Severity {
	if (level <= LogLevels.debug) return Severity.Debug;
	if (level <= LogLevels.info) return Severity.Info;
	if (level <= 2) return Severity.Notice;
	if (level <= LogLevels.warn) return Severity.Warning;
	if (level <= LogLevels.error) return Severity.Err;
	if (level <= 12) return Severity.Crit;
	if (level <= 16) return Severity.Alert;
	return Severity.Emerg;
}

// ─── Body Rendering ──────────────────────────────────────────────────────────

const RESERVED_KEYS = new Set(['time', 'level', 'msg']);

function jsonReplacer(_key: string, value: unknown): unknown {
	if (typeof value === 'bigint') return value.toString();
	if (value instanceof Error) return { name: value.name, message: value.message };
	return value;
}

/**
 * Render a record as a single JSON line: `time`, `level` and `msg` first,
 * then the attributes. An attribute that collides with one of the fixed
 * keys is written as `attrs.<key>`.
 */
export function renderBody(record: LogRecord): string {
	const body: Record<string, unknown> = {
		time: record.time.toISOString(),
		level: levelName(record.level),
		msg: record.message,
	};
	for (const [key, value] of Object.entries(record.attrs ?? {})) {
		body[RESERVED_KEYS.has(key) ? `attrs.${key}` : key] = value;
	}
	return JSON.stringify(body, jsonReplacer);
}

/** MSGID comes from `record.id`, not the message text, which may contain spaces. */
export function toMessage(record: LogRecord, facility: Facility): Message {
	return {
		time: record.time,
		severity: levelToSeverity(record.level),
		facility,
		id: record.id,
		body: renderBody(record),
	};
}

// ─── Config Translation ──────────────────────────────────────────────────────

/** Name of the running program, e.g. "worker" for `node dist/worker.js` */
export function programName(argv: readonly string[] = process.argv): string {
	const script = argv[1] ?? argv[0] ?? '';
	const name = basename(script, extname(script));
	return name.replace(/\s+/g, '_');
}

/** @throws ConfigurationError for an unknown facility name */
export function resolveFacility(name: string | undefined): Facility {
	const parsed = parseFacility(name ?? 'local0');
	if (!parsed.ok) {
		throw new ConfigurationError(`unknown syslog facility "${name}"`, [parsed.error.message], {
			cause: parsed.error,
		});
	}
	return parsed.value;
}

/** Hooks that are not expressible in YAML */
export interface SyslogLoggerOptions {
	dial?: DialFunction;
	backoff?: BackoffPolicy;
	platform?: PlatformCapability;
	now?: () => number;
	onLog?: (message: string) => void;
}

/**
 * Translate a validated logger config into client settings. Explicit
 * `network` / `address` override the corresponding half of `target`.
 *
 * @throws ConfigurationError for a malformed target or backoff duration
 */
export function toClientConfig(cfg: SyslogLoggerConfig, options: SyslogLoggerOptions = {}): SyslogClientConfig {
	let target: { network: string; address: string };
	try {
		target = parseTargetSpec(cfg.target ?? '');
	} catch (err) {
		if (err instanceof ParseError) {
			throw new ConfigurationError(err.message, [err.message], { cause: err });
		}
		throw err;
	}

	return {
		network: cfg.network ?? target.network,
		address: cfg.address ?? target.address,
		protocol: cfg.protocol,
		framing: cfg.framing,
		bom: cfg.bom,
		hostName: cfg.host_name,
		processName: cfg.process_name ?? programName(),
		utc: cfg.utc,
		backoff: options.backoff ?? (cfg.backoff ? createBackoff(cfg.backoff) : undefined),
		dial: options.dial,
		platform: options.platform,
		now: options.now,
		onLog: options.onLog,
	};
}

// ─── Syslog Logger ───────────────────────────────────────────────────────────

export class SyslogLogger implements Logger {
	readonly id = 'syslog';
	private client: SyslogClient | null = null;
	private facility: Facility = resolveFacility('local0');
	private readonly options: SyslogLoggerOptions;

	constructor(options: SyslogLoggerOptions = {}) {
		this.options = options;
	}

	/** @throws ConfigurationError when the config block is invalid */
	async init(config: Record<string, unknown>): Promise<void> {
		const cfg = validateSyslogLoggerConfig(config);
		this.facility = resolveFacility(cfg.facility);
		this.client = new SyslogClient(toClientConfig(cfg, this.options));
	}

	/** Write one record. Client errors (backoff, connect, write) propagate. */
	async log(record: LogRecord): Promise<void> {
		if (!this.client) {
			throw new ClosedError('syslog logger is not initialised');
		}
		await this.client.write(toMessage(record, this.facility));
	}

	async flush(): Promise<void> {
		// Every write completes on the wire before log() resolves
	}

	async shutdown(): Promise<void> {
		if (this.client) {
			const client = this.client;
			this.client = null;
			await client.close();
		}
	}
}
