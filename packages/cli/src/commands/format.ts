/**
 * syslogkit format: print the exact bytes a message would be sent as,
 * without connecting.
 */

import { hostname } from 'node:os';
import {
	formatMessage,
	makePri,
	type Message,
	resolveSettings,
	resolveTargets,
	type ResolvedSettings,
} from '@syslogkit/client';
import { type SyslogLoggerConfig, toClientConfig } from '@syslogkit/logger-syslog';
import type { Command } from 'commander';
import { loadCliConfig } from '../config.js';
import { globalConfigPath } from '../global-options.js';
import { addMessageOptions, buildLoggerConfig, buildMessage, type MessageOptions } from '../message-options.js';
import * as output from '../output.js';

interface FormatOptions extends MessageOptions {
	network?: string;
}

/**
 * Printable ASCII is kept; backslash, LF and every other byte are escaped
 * (`\\`, `\n`, `\xHH`).
 */
export function escapeBytes(data: Uint8Array): string {
	let out = '';
	for (const byte of data) {
		if (byte === 0x5c) out += '\\\\';
		else if (byte === 0x0a) out += '\\n';
		else if (byte >= 0x20 && byte < 0x7f) out += String.fromCharCode(byte);
		else out += `\\x${byte.toString(16).padStart(2, '0')}`;
	}
	return out;
}

export interface RenderOptions {
	/** Network kind to resolve auto settings against */
	network: string;
	now?: () => number;
	processId?: number;
}

export interface RenderedMessage {
	settings: ResolvedSettings;
	bytes: Buffer;
}

/** Encode a message as a client connected over `network` would. */
export function renderMessage(config: SyslogLoggerConfig, message: Message, options: RenderOptions): RenderedMessage {
	const clientConfig = toClientConfig(config);
	const settings = resolveSettings(clientConfig, options.network, hostname);
	const timestamp = message.time ?? new Date((options.now ?? Date.now)());
	const bytes = formatMessage({
		protocol: settings.protocol,
		framing: settings.framing,
		bom: settings.bom,
		pri: makePri(message.severity, message.facility),
		timestamp,
		utcOffsetMinutes: clientConfig.utc ? 0 : -timestamp.getTimezoneOffset(),
		hostName: settings.hostName,
		processName: settings.processName,
		processId: options.processId ?? process.pid,
		messageId: message.id,
		body: message.body,
		structuredData: message.structuredData,
	});
	return { settings, bytes };
}

/** The network of the first candidate target, when --network is not given */
export function defaultNetwork(config: SyslogLoggerConfig): string {
	const clientConfig = toClientConfig(config);
	return resolveTargets(clientConfig.network, clientConfig.address)[0].network;
}

// ─── Command registration ────────────────────────────────────────────────────

export function registerFormatCommand(program: Command): void {
	addMessageOptions(
		program
			.command('format')
			.description('Print the encoded form of a message without sending it')
			.argument('[message...]', 'Message text'),
	)
		.option('-n, --network <network>', 'Resolve settings for this network (default: first target)')
		.action(async (words: string[], opts: FormatOptions, cmd: Command) => {
			try {
				const fileConfig = await loadCliConfig({ configPath: globalConfigPath(cmd) });
				const config = buildLoggerConfig(fileConfig, opts);
				const network = opts.network ?? defaultNetwork(config);
				const { settings, bytes } = renderMessage(config, buildMessage(words.join(' '), opts, config), {
					network,
				});

				if (output.isJsonMode()) {
					output.json({ settings, length: bytes.length, escaped: escapeBytes(bytes) });
					return;
				}
				output.heading(`${network}: ${settings.protocol}, framing=${settings.framing}, bom=${settings.bom}`);
				console.log(escapeBytes(bytes));
			} catch (err) {
				output.error(`Format failed: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
