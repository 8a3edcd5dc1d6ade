/**
 * Default transport dialer.
 *
 * Stream transports (TCP, Unix stream sockets) use node:net; UDP uses a
 * connected node:dgram socket so ICMP errors surface on the next send.
 * Node has no Unix datagram sockets, so `unixgram` needs a custom dialer.
 */

import { type Socket as UdpSocket, createSocket } from 'node:dgram';
import { type NetConnectOpts, type Socket as TcpSocket, createConnection, isIP } from 'node:net';
import { DEFAULT_PORT } from './protocol.js';
import { splitHostPort } from './targets.js';

// ─── Connection Interface ────────────────────────────────────────────────────

/** A live transport handle, exclusively owned by one client. */
export interface SyslogConnection {
	/**
	 * Network kind of the transport that actually connected ("tcp", "udp",
	 * "unix", ...). When absent, the dialed target's network is assumed.
	 */
	readonly network?: string;
	/** Resolves once the bytes have been handed to the transport. */
	write(data: Uint8Array): Promise<void>;
	close(): void;
}

/** Connects to one target. The signal bounds the connect phase only. */
export type DialFunction = (
	network: string,
	address: string,
	signal?: AbortSignal,
) => Promise<SyslogConnection>;

function abortReason(signal: AbortSignal): Error {
	return signal.reason instanceof Error ? signal.reason : new Error('dial aborted');
}

// ─── Stream Transport ────────────────────────────────────────────────────────

export class StreamConnection implements SyslogConnection {
	private failure: Error | null = null;

	constructor(
		readonly network: string,
		private readonly socket: TcpSocket,
	) {
		socket.on('error', (err) => {
			this.failure = err;
		});
		socket.on('close', () => {
			this.failure ??= new Error('connection closed');
		});
		// Don't keep the process alive for an idle log connection
		socket.unref();
	}

	write(data: Uint8Array): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			if (this.failure) {
				reject(this.failure);
				return;
			}
			if (this.socket.destroyed || !this.socket.writable) {
				reject(new Error('socket is not writable'));
				return;
			}
			this.socket.write(data, (err) => {
				if (err) reject(err);
				else resolve();
			});
		});
	}

	close(): void {
		this.socket.destroy();
	}
}

function dialStream(network: string, options: NetConnectOpts, signal?: AbortSignal): Promise<SyslogConnection> {
	return new Promise<SyslogConnection>((resolve, reject) => {
		if (signal?.aborted) {
			reject(abortReason(signal));
			return;
		}

		const socket = createConnection(options);

		const onAbort = () => {
			socket.destroy();
			if (signal) reject(abortReason(signal));
		};
		const onError = (err: Error) => {
			signal?.removeEventListener('abort', onAbort);
			socket.destroy();
			reject(err);
		};

		socket.once('error', onError);
		socket.once('connect', () => {
			signal?.removeEventListener('abort', onAbort);
			socket.off('error', onError);
			resolve(new StreamConnection(network, socket));
		});
		signal?.addEventListener('abort', onAbort, { once: true });
	});
}

// ─── Datagram Transport ──────────────────────────────────────────────────────

export class DatagramConnection implements SyslogConnection {
	readonly network = 'udp';
	private closed = false;
	private failure: Error | null = null;

	constructor(private readonly socket: UdpSocket) {
		socket.on('error', (err) => {
			this.failure = err;
		});
		socket.unref();
	}

	write(data: Uint8Array): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			if (this.closed) {
				reject(new Error('socket is closed'));
				return;
			}
			if (this.failure) {
				reject(this.failure);
				return;
			}
			this.socket.send(data, (err) => {
				if (err) reject(err);
				else resolve();
			});
		});
	}

	close(): void {
		if (this.closed) return;
		this.closed = true;
		this.socket.close();
	}
}

function dialDatagram(network: string, address: string, signal?: AbortSignal): Promise<SyslogConnection> {
	const { host, port } = splitHostPort(address);
	const type = network === 'udp6' || (network === 'udp' && isIP(host) === 6) ? 'udp6' : 'udp4';

	return new Promise<SyslogConnection>((resolve, reject) => {
		if (signal?.aborted) {
			reject(abortReason(signal));
			return;
		}

		const socket = createSocket(type);
		let settled = false;

		const fail = (err: Error) => {
			if (settled) return;
			settled = true;
			signal?.removeEventListener('abort', onAbort);
			socket.close();
			reject(err);
		};
		const onAbort = () => {
			if (signal) fail(abortReason(signal));
		};

		socket.once('error', fail);
		signal?.addEventListener('abort', onAbort, { once: true });
		socket.connect(port ?? DEFAULT_PORT, host, () => {
			if (settled) return;
			settled = true;
			signal?.removeEventListener('abort', onAbort);
			socket.off('error', fail);
			resolve(new DatagramConnection(socket));
		});
	});
}

// ─── Dialer ──────────────────────────────────────────────────────────────────

export const defaultDial: DialFunction = async (network, address, signal) => {
	switch (network) {
		case 'unix':
			return dialStream('unix', { path: address }, signal);
		case 'tcp':
		case 'tcp4':
		case 'tcp6': {
			const { host, port } = splitHostPort(address);
			const family = network === 'tcp4' ? 4 : network === 'tcp6' ? 6 : 0;
			return dialStream('tcp', { host, port: port ?? DEFAULT_PORT, family }, signal);
		}
		case 'udp':
		case 'udp4':
		case 'udp6':
			return dialDatagram(network, address, signal);
		case 'unixgram':
			throw new Error('unixgram sockets are not supported by the default dialer; supply a custom dial function');
		default:
			throw new Error(`unsupported syslog network "${network}"`);
	}
};
