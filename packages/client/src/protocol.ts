/**
 * SYSLOG protocol variants, framing modes, and BOM policy.
 *
 * Feature matrix of the three wire variants:
 *
 *	Feature          v0-local  v0-net  v1-net
 *	---------------  --------  ------  ------
 *	Timestamp        old       old     RFC 3339
 *	Hostname                   X       X
 *	Message ID       (body)    (body)  X
 *	Structured Data                    X
 */

/** The standard UDP port for SYSLOG. */
export const DEFAULT_PORT = 514;

/**
 * - `v0-local`: old timestamp, no hostname; local daemon over a Unix socket.
 * - `v0-net`: RFC 3164 with a hostname field.
 * - `v1-net`: RFC 5424.
 */
export type Protocol = 'auto' | 'v0-local' | 'v0-net' | 'v1-net';

/**
 * Only relevant for byte-stream transports (RFC 6587). `none` is for
 * datagram and Unix socket transports, which carry one message each.
 */
export type Framing = 'auto' | 'length' | 'nul' | 'lf' | 'none';

export type BomMode = 'auto' | 'always' | 'never';

export type ResolvedProtocol = Exclude<Protocol, 'auto'>;
export type ResolvedFraming = Exclude<Framing, 'auto'>;
export type ResolvedBomMode = Exclude<BomMode, 'auto'>;

export const PROTOCOLS: readonly Protocol[] = ['auto', 'v0-local', 'v0-net', 'v1-net'];
export const FRAMINGS: readonly Framing[] = ['auto', 'length', 'nul', 'lf', 'none'];
export const BOM_MODES: readonly BomMode[] = ['auto', 'always', 'never'];

export function isLocalNetwork(network: string): boolean {
	return network.startsWith('unix');
}

/** Datagram and Unix socket transports preserve message boundaries. */
export function needsFraming(network: string): boolean {
	switch (network) {
		case 'unix':
		case 'unixgram':
		case 'udp':
		case 'udp4':
		case 'udp6':
			return false;
		default:
			return true;
	}
}

export function resolveProtocol(protocol: Protocol, network: string): ResolvedProtocol {
	if (protocol !== 'auto') return protocol;
	return isLocalNetwork(network) ? 'v0-local' : 'v1-net';
}

export function resolveFraming(framing: Framing, network: string): ResolvedFraming {
	if (!needsFraming(network)) return 'none';
	return framing === 'auto' ? 'nul' : framing;
}

export function resolveBomMode(bom: BomMode, protocol: ResolvedProtocol): ResolvedBomMode {
	if (bom !== 'auto') return bom;
	return protocol === 'v1-net' ? 'always' : 'never';
}

// ─── Resolved settings ───────────────────────────────────────────────────────

/** Concrete formatting settings for one live connection. */
export interface ResolvedSettings {
	readonly network: string;
	readonly protocol: ResolvedProtocol;
	readonly framing: ResolvedFraming;
	readonly bom: ResolvedBomMode;
	readonly hostName: string;
	readonly processName: string;
}

export interface SettingsInput {
	protocol?: Protocol;
	framing?: Framing;
	bom?: BomMode;
	hostName?: string;
	processName?: string;
}

/**
 * Resolve every `auto` value against the network kind of the transport
 * that actually connected. Idempotent for already-concrete values.
 */
export function resolveSettings(
	input: SettingsInput,
	network: string,
	localHostName: () => string,
): ResolvedSettings {
	const protocol = resolveProtocol(input.protocol ?? 'auto', network);
	return Object.freeze({
		network,
		protocol,
		framing: resolveFraming(input.framing ?? 'auto', network),
		bom: resolveBomMode(input.bom ?? 'auto', protocol),
		hostName: input.hostName || localHostName(),
		processName: input.processName ?? '',
	});
}
