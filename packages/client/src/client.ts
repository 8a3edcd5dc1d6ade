/**
 * SyslogClient: a long-lived SYSLOG writer.
 *
 * Owns at most one connection, resolves protocol/framing/BOM against the
 * transport that actually connected, and reconnects after failures at a
 * rate bounded by its backoff policy. Nothing is buffered: a failed write
 * is a lost message unless the caller keeps it.
 */

import { hostname } from 'node:os';
import { type BackoffPolicy, ExponentialBackoff } from './backoff.js';
import { type DialFunction, defaultDial, type SyslogConnection } from './dial.js';
import {
	BackoffError,
	ClosedError,
	ConfigurationError,
	ConnectError,
	WriteError,
} from './errors.js';
import { formatMessage } from './format.js';
import { Mutex } from './mutex.js';
import type { PlatformCapability } from './platform.js';
import { type Facility, makePri, type Severity } from './pri.js';
import {
	BOM_MODES,
	FRAMINGS,
	PROTOCOLS,
	type ResolvedSettings,
	resolveSettings,
	type SettingsInput,
} from './protocol.js';
import { resolveTargets, type Target } from './targets.js';

// ─── Types ───────────────────────────────────────────────────────────────────

/** One SYSLOG message. */
export interface Message {
	/** Defaults to the time of the write */
	time?: Date;
	severity: Severity;
	facility: Facility;
	/**
	 * Message ID. For the v0 protocols, which have no such field, a
	 * non-empty ID is prepended to the body followed by a space.
	 */
	id?: string;
	body: string;
	/** Pre-encoded RFC 5424 structured data; ignored by the v0 protocols */
	structuredData?: string;
}

export interface SyslogClientConfig extends SettingsInput {
	/**
	 * "udp", "tcp", "unix" or "unixgram" (plus the 4/6 variants). With both
	 * network and address empty, local daemon sockets are autodetected.
	 */
	network?: string;
	/** Socket path for unix networks, otherwise "host[:port]" */
	address?: string;
	/** Reconnect rate limit (default: exponential, 5s doubling up to 2m) */
	backoff?: BackoffPolicy;
	/** Replaces the default dialer, e.g. to add TLS */
	dial?: DialFunction;
	/** Render timestamps in UTC rather than the local offset */
	utc?: boolean;
	/** Local-socket capability used for autodetection */
	platform?: PlatformCapability;
	/** Overrides process.pid in emitted messages */
	processId?: number;
	/** Clock in ms since the epoch (default: Date.now) */
	now?: () => number;
	/** Diagnostic callback for connection events */
	onLog?: (message: string) => void;
}

export interface WriteOptions {
	/** Bounds the connect phase; a write already in progress is never cancelled */
	signal?: AbortSignal;
}

interface ActiveConnection {
	readonly connection: SyslogConnection;
	readonly settings: ResolvedSettings;
}

// ─── Validation ──────────────────────────────────────────────────────────────

function validateConfig(config: SyslogClientConfig): void {
	const errors: string[] = [];
	if (config.protocol !== undefined && !PROTOCOLS.includes(config.protocol)) {
		errors.push(`unknown protocol "${config.protocol}"`);
	}
	if (config.framing !== undefined && !FRAMINGS.includes(config.framing)) {
		errors.push(`unknown framing "${config.framing}"`);
	}
	if (config.bom !== undefined && !BOM_MODES.includes(config.bom)) {
		errors.push(`unknown BOM mode "${config.bom}"`);
	}
	if (config.hostName && /\s/.test(config.hostName)) {
		errors.push('host name must not contain whitespace');
	}
	if (config.processName && /\s/.test(config.processName)) {
		errors.push('process name must not contain whitespace');
	}
	if (errors.length > 0) {
		throw new ConfigurationError(`invalid syslog config: ${errors.join('; ')}`, errors);
	}
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

function toWriteError(err: unknown): WriteError {
	if (err instanceof WriteError) return err;
	return new WriteError(`syslog write failed: ${errorMessage(err)}`, { cause: err });
}

// ─── Client ──────────────────────────────────────────────────────────────────

export class SyslogClient {
	private active: ActiveConnection | null = null;
	private closed = false;
	private reconnectNotBefore = 0;

	private readonly config: SyslogClientConfig;
	private readonly targets: readonly Target[];
	private readonly backoff: BackoffPolicy;
	private readonly dial: DialFunction;
	private readonly now: () => number;
	private readonly mutex = new Mutex();

	/** Callback for diagnostics, set by the consumer */
	onLog: ((message: string) => void) | null;

	/** @throws ConfigurationError when the config or transport spec is unusable */
	constructor(config: SyslogClientConfig = {}) {
		validateConfig(config);
		this.config = { ...config };
		this.targets = Object.freeze(resolveTargets(config.network, config.address, config.platform));
		this.backoff = config.backoff ?? new ExponentialBackoff();
		this.dial = config.dial ?? defaultDial;
		this.now = config.now ?? Date.now;
		this.onLog = config.onLog ?? null;
	}

	/** Candidate targets, most preferred first */
	get targetList(): readonly Target[] {
		return this.targets;
	}

	/** Settings of the live connection, or null when disconnected */
	get settings(): ResolvedSettings | null {
		return this.active?.settings ?? null;
	}

	get isConnected(): boolean {
		return this.active !== null;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/**
	 * Connect now rather than on the first write. Subject to the same
	 * closed and backoff rules as a write.
	 */
	async connect(options: WriteOptions = {}): Promise<ResolvedSettings> {
		return this.mutex.runExclusive(async () => (await this.ensureConnection(options.signal)).settings);
	}

	/**
	 * Write one message. Reconnects if needed; on a transport failure the
	 * connection is replaced and the write retried exactly once.
	 *
	 * @throws ClosedError, BackoffError, ConnectError or WriteError
	 */
	async write(message: Message, options: WriteOptions = {}): Promise<void> {
		return this.mutex.runExclusive(() => this.writeExclusive(message, options.signal));
	}

	/** Idempotent. All later writes fail with ClosedError. */
	async close(): Promise<void> {
		await this.mutex.runExclusive(async () => {
			this.destroyConnection();
			this.closed = true;
		});
	}

	// ─── Internals (lock held) ───────────────────────────────────────────────

	private async writeExclusive(message: Message, signal?: AbortSignal): Promise<void> {
		let active = await this.ensureConnection(signal);

		const timestamp = message.time ?? new Date(this.now());
		const pri = makePri(message.severity, message.facility);

		try {
			await this.send(active, message, pri, timestamp);
		} catch (err) {
			const writeError = toWriteError(err);
			this.log(`write failed, reconnecting: ${writeError.message}`);
			this.destroyConnection();

			try {
				active = await this.ensureConnection(signal);
			} catch (reconnectErr) {
				// The original write failure is the more actionable of the two
				this.log(`reconnect failed: ${errorMessage(reconnectErr)}`);
				throw writeError;
			}

			try {
				await this.send(active, message, pri, timestamp);
			} catch (retryErr) {
				this.destroyConnection();
				throw toWriteError(retryErr);
			}
		}

		this.backoff.reset();
	}

	private async send(active: ActiveConnection, message: Message, pri: number, timestamp: Date): Promise<void> {
		const { settings } = active;
		const data = formatMessage({
			protocol: settings.protocol,
			framing: settings.framing,
			bom: settings.bom,
			pri,
			timestamp,
			utcOffsetMinutes: this.config.utc ? 0 : -timestamp.getTimezoneOffset(),
			hostName: settings.hostName,
			processName: settings.processName,
			processId: this.config.processId ?? process.pid,
			messageId: message.id,
			body: message.body,
			structuredData: message.structuredData,
		});
		await active.connection.write(data);
	}

	private async ensureConnection(signal?: AbortSignal): Promise<ActiveConnection> {
		if (this.active) return this.active;
		if (this.closed) throw new ClosedError();

		const now = this.now();
		if (now < this.reconnectNotBefore) {
			throw new BackoffError(this.reconnectNotBefore - now);
		}

		// Consumed before dialing, so a hung attempt cannot be retried early
		this.reconnectNotBefore = now + this.backoff.nextDelay();

		const { connection, target } = await this.dialTargets(signal);
		const network = connection.network ?? target.network;
		const settings = resolveSettings(this.config, network, hostname);
		this.active = { connection, settings };
		this.log(
			`connected to ${target.network}:${target.address} (${settings.protocol}, framing=${settings.framing}, bom=${settings.bom})`,
		);
		return this.active;
	}

	private async dialTargets(signal?: AbortSignal): Promise<{ connection: SyslogConnection; target: Target }> {
		let firstError: unknown;
		let attempted = false;

		for (const target of this.targets) {
			if (signal?.aborted && attempted) break;
			attempted = true;
			try {
				const connection = await this.dial(target.network, target.address, signal);
				return { connection, target };
			} catch (err) {
				this.log(`dial ${target.network}:${target.address} failed: ${errorMessage(err)}`);
				if (firstError === undefined) firstError = err;
			}
		}

		const first = this.targets[0];
		throw new ConnectError(first.network, first.address, { cause: firstError });
	}

	private destroyConnection(): void {
		if (!this.active) return;
		const { connection } = this.active;
		this.active = null;
		try {
			connection.close();
		} catch (err) {
			this.log(`error closing connection: ${errorMessage(err)}`);
		}
	}

	private log(message: string): void {
		this.onLog?.(message);
	}
}
