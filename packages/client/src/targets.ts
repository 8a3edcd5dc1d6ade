/**
 * Target resolution: turn a (network, address) transport spec into the
 * ordered list of candidates a client dials.
 */

import { ConfigurationError, ParseError } from './errors.js';
import { detectPlatform, type PlatformCapability } from './platform.js';
import { DEFAULT_PORT } from './protocol.js';

export interface Target {
	readonly network: string;
	readonly address: string;
}

const LOCAL_NETWORKS = ['unixgram', 'unix'] as const;

function localTargets(network: string, address: string, platform: PlatformCapability): Target[] | null {
	if (network !== '' && network !== 'unix' && network !== 'unixgram') return null;
	if (address !== '' && !address.startsWith('/')) return null;
	if (!platform.supportsLocalSockets) return null;

	const targets: Target[] = [];
	for (const kind of LOCAL_NETWORKS) {
		if (network !== '' && kind !== network) continue;
		const paths = address !== '' ? [address] : platform.localSocketPaths;
		for (const path of paths) {
			targets.push(Object.freeze({ network: kind, address: path }));
		}
	}
	return targets;
}

/**
 * Split `host:port`, accepting bracketed IPv6 (`[::1]:514`). The port is
 * `undefined` when absent.
 */
export function splitHostPort(address: string): { host: string; port: number | undefined } {
	if (address.startsWith('[')) {
		const end = address.indexOf(']');
		if (end < 0) {
			throw new ConfigurationError(`missing ']' in address "${address}"`);
		}
		const host = address.slice(1, end);
		const rest = address.slice(end + 1);
		if (rest === '') return { host, port: undefined };
		if (!rest.startsWith(':')) {
			throw new ConfigurationError(`unexpected "${rest}" after ']' in address "${address}"`);
		}
		return { host, port: parsePort(rest.slice(1), address) };
	}

	const colons = address.split(':').length - 1;
	if (colons === 0) return { host: address, port: undefined };
	if (colons > 1) {
		throw new ConfigurationError(`IPv6 address "${address}" must be enclosed in brackets`);
	}
	const idx = address.indexOf(':');
	return { host: address.slice(0, idx), port: parsePort(address.slice(idx + 1), address) };
}

function parsePort(value: string, address: string): number {
	if (!/^\d+$/.test(value)) {
		throw new ConfigurationError(`invalid port in address "${address}"`);
	}
	const port = Number.parseInt(value, 10);
	if (port > 65535) {
		throw new ConfigurationError(`port out of range in address "${address}"`);
	}
	return port;
}

/**
 * Resolve the ordered candidate list for a transport spec.
 *
 * An empty or `unix*` network with an empty or absolute-path address tries
 * local sockets first (datagram before stream). Anything else is a network
 * destination: `udp` by default, port 514 unless given.
 */
export function resolveTargets(
	network = '',
	address = '',
	platform: PlatformCapability = detectPlatform(),
): Target[] {
	const local = localTargets(network, address, platform);
	if (local !== null && local.length > 0) {
		return local;
	}

	if (address === '') {
		throw new ConfigurationError('no syslog address specified');
	}

	const { port } = splitHostPort(address);
	const resolvedAddress = port === undefined ? `${address}:${DEFAULT_PORT}` : address;

	return [Object.freeze({ network: network || 'udp', address: resolvedAddress })];
}

/**
 * Parse a `network:address` target spec such as `udp:127.0.0.1:514`,
 * `unixgram:/dev/log` or `tcp://logs.example.com:601`. An empty spec means
 * "autodetect" and yields empty network and address.
 */
export function parseTargetSpec(spec: string): { network: string; address: string } {
	if (spec === '') return { network: '', address: '' };

	const idx = spec.indexOf(':');
	if (idx < 0) {
		throw new ParseError('target', spec, {
			cause: new Error("target must be of form 'network:address'"),
		});
	}

	let address = spec.slice(idx + 1);
	if (address.startsWith('//')) address = address.slice(2);
	return { network: spec.slice(0, idx), address };
}
