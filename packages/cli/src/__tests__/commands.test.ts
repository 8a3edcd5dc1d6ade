/**
 * Tests for the send, format and targets commands' building blocks, using
 * an in-memory dial function in place of a syslog receiver.
 */

import {
	ConfigurationError,
	ConnectError,
	type DialFunction,
	Facility,
	ParseError,
	Severity,
	type SyslogConnection,
} from '@syslogkit/client';
import { describe, expect, it } from 'vitest';
import { defaultNetwork, escapeBytes, renderMessage } from '../commands/format.js';
import { collectBodies, sendMessages } from '../commands/send.js';
import { listTargets } from '../commands/targets.js';
import { buildLoggerConfig, buildMessage, resolveSeverity } from '../message-options.js';

const REF_TIME = new Date(Date.UTC(2021, 9, 11, 7, 25, 0, 0));

// ─── Message options ─────────────────────────────────────────────────────────

describe('buildLoggerConfig', () => {
	it('defaults the tag', () => {
		expect(buildLoggerConfig({}, { severity: 'info' })).toEqual({ process_name: 'syslogkit' });
	});

	it('overlays flags on the file config', () => {
		const config = buildLoggerConfig(
			{ facility: 'daemon', process_name: 'from-file' },
			{ severity: 'info', tag: 'myapp', hostname: 'h1', utc: true, protocol: 'v0-net' },
		);
		expect(config).toEqual({
			facility: 'daemon',
			process_name: 'myapp',
			host_name: 'h1',
			utc: true,
			protocol: 'v0-net',
		});
	});

	it('replaces network and address from the file with --target', () => {
		const config = buildLoggerConfig(
			{ network: 'tcp', address: 'logs.internal:601' },
			{ severity: 'info', target: 'udp:127.0.0.1:514' },
		);
		expect(config).toEqual({ process_name: 'syslogkit', target: 'udp:127.0.0.1:514' });
	});

	it('rejects an unknown framing flag', () => {
		expect(() => buildLoggerConfig({}, { severity: 'info', framing: 'crlf' })).toThrow(ConfigurationError);
	});
});

describe('resolveSeverity', () => {
	it('accepts names and aliases', () => {
		expect(resolveSeverity('warn')).toBe(Severity.Warning);
		expect(resolveSeverity('CRITICAL')).toBe(Severity.Crit);
	});

	it('throws ParseError for unknown names', () => {
		expect(() => resolveSeverity('loud')).toThrow(ParseError);
		expect(() => resolveSeverity('loud')).toThrow('bad severity string: "loud"');
	});
});

describe('buildMessage', () => {
	it('combines flags and config', () => {
		const message = buildMessage('hi', { severity: 'err', msgid: 'm1', sd: '[ex@32473 k="v"]' }, { facility: 'user' });
		expect(message).toEqual({
			severity: Severity.Err,
			facility: Facility.User,
			id: 'm1',
			body: 'hi',
			structuredData: '[ex@32473 k="v"]',
		});
	});

	it('defaults the facility to local0', () => {
		expect(buildMessage('hi', { severity: 'info' }, {}).facility).toBe(Facility.Local0);
	});
});

// ─── send ────────────────────────────────────────────────────────────────────

describe('collectBodies', () => {
	it('joins message words into one body', () => {
		expect(collectBodies(['disk', 'almost', 'full'])).toEqual(['disk almost full']);
	});

	it('splits stdin into non-empty lines', () => {
		expect(collectBodies([], 'first\n\n second \r\nthird\n')).toEqual(['first', ' second ', 'third']);
	});

	it('returns nothing without words or stdin', () => {
		expect(collectBodies([])).toEqual([]);
	});
});

class MemoryConnection implements SyslogConnection {
	writes: string[] = [];
	closed = false;

	async write(data: Uint8Array): Promise<void> {
		this.writes.push(Buffer.from(data).toString('utf-8'));
	}

	close(): void {
		this.closed = true;
	}
}

describe('sendMessages', () => {
	const baseConfig = {
		network: 'udp',
		address: '127.0.0.1:514',
		hostName: 'HostName',
		processName: 'ProcName',
		processId: 7,
		utc: true,
		bom: 'never' as const,
	};

	it('writes every message over one connection and closes it', async () => {
		const connections: MemoryConnection[] = [];
		const dial: DialFunction = async () => {
			const conn = new MemoryConnection();
			connections.push(conn);
			return conn;
		};

		const settings = await sendMessages({ ...baseConfig, dial }, [
			{ time: REF_TIME, severity: Severity.Info, facility: Facility.User, body: 'one' },
			{ time: REF_TIME, severity: Severity.Err, facility: Facility.User, id: 'm2', body: 'two' },
		]);

		expect(connections).toHaveLength(1);
		expect(connections[0].writes).toEqual([
			'<14>1 2021-10-11T07:25:00Z HostName ProcName 7 - - one',
			'<11>1 2021-10-11T07:25:00Z HostName ProcName 7 m2 - two',
		]);
		expect(connections[0].closed).toBe(true);
		expect(settings?.network).toBe('udp');
		expect(settings?.protocol).toBe('v1-net');
		expect(settings?.framing).toBe('none');
	});

	it('propagates dial failures', async () => {
		const dial: DialFunction = async () => {
			throw new Error('connection refused');
		};

		await expect(
			sendMessages({ ...baseConfig, dial }, [{ severity: Severity.Info, facility: Facility.User, body: 'x' }]),
		).rejects.toThrow(ConnectError);
	});
});

// ─── format ──────────────────────────────────────────────────────────────────

describe('escapeBytes', () => {
	it('keeps printable ASCII and escapes everything else', () => {
		expect(escapeBytes(Buffer.from('a\\b\n\x00\uFEFFc', 'utf-8'))).toBe(String.raw`a\\b\n\x00\xef\xbb\xbfc`);
	});
});

describe('renderMessage', () => {
	const config = { host_name: 'HostName', process_name: 'ProcName', utc: true };
	const message = { time: REF_TIME, severity: Severity.Info, facility: Facility.User, body: 'hello' };

	it('renders RFC 5424 with NUL framing and a BOM over TCP', () => {
		const { settings, bytes } = renderMessage(config, message, { network: 'tcp', processId: 42 });
		expect(settings.protocol).toBe('v1-net');
		expect(settings.framing).toBe('nul');
		expect(settings.bom).toBe('always');
		expect(escapeBytes(bytes)).toBe(
			String.raw`<14>1 2021-10-11T07:25:00Z HostName ProcName 42 - - \xef\xbb\xbfhello\x00`,
		);
	});

	it('prefixes the octet count with length framing', () => {
		const { bytes } = renderMessage({ ...config, bom: 'never', framing: 'length' }, message, {
			network: 'tcp',
			processId: 42,
		});
		expect(bytes.toString('utf-8')).toBe('57 <14>1 2021-10-11T07:25:00Z HostName ProcName 42 - - hello');
	});

	it('renders the local format for unix sockets', () => {
		const { settings, bytes } = renderMessage(config, message, { network: 'unixgram', processId: 42 });
		expect(settings.protocol).toBe('v0-local');
		expect(bytes.toString('utf-8')).toBe('<14>Oct 11 07:25:00 ProcName[42]: hello');
	});

	it('stamps messages without a time from the clock', () => {
		const { bytes } = renderMessage(
			{ ...config, bom: 'never' },
			{ severity: Severity.Info, facility: Facility.User, body: 'hello' },
			{ network: 'udp', processId: 42, now: () => REF_TIME.getTime() },
		);
		expect(bytes.toString('utf-8')).toBe('<14>1 2021-10-11T07:25:00Z HostName ProcName 42 - - hello');
	});
});

describe('defaultNetwork', () => {
	it('uses the configured target', () => {
		expect(defaultNetwork({ target: 'tcp:logs.internal:601' })).toBe('tcp');
	});
});

// ─── targets ─────────────────────────────────────────────────────────────────

describe('listTargets', () => {
	it('adds the default port', () => {
		expect(listTargets({}, 'tcp:logs.internal')).toEqual([{ network: 'tcp', address: 'logs.internal:514' }]);
	});

	it('lets --target replace the configured network and address', () => {
		expect(listTargets({ network: 'tcp', address: 'other:601' }, 'udp:127.0.0.1:514')).toEqual([
			{ network: 'udp', address: '127.0.0.1:514' },
		]);
	});

	it('uses the config when no --target is given', () => {
		expect(listTargets({ target: 'udp:10.0.0.5:1514' })).toEqual([{ network: 'udp', address: '10.0.0.5:1514' }]);
	});
});
