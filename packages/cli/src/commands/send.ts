/**
 * syslogkit send: write messages to a syslog receiver.
 *
 * Message words are joined into one body. With no words, each non-empty
 * line of stdin becomes a message.
 */

import { text } from 'node:stream/consumers';
import {
	type Message,
	type ResolvedSettings,
	SyslogClient,
	type SyslogClientConfig,
} from '@syslogkit/client';
import { toClientConfig } from '@syslogkit/logger-syslog';
import { parseDuration } from '@syslogkit/sdk';
import type { Command } from 'commander';
import { globalConfigPath } from '../global-options.js';
import { loadCliConfig } from '../config.js';
import { addMessageOptions, buildLoggerConfig, buildMessage, type MessageOptions } from '../message-options.js';
import * as output from '../output.js';

interface SendOptions extends MessageOptions {
	timeout: string;
}

/** Message bodies from the command words, or from stdin text when there are none */
export function collectBodies(words: string[], stdinText?: string): string[] {
	if (words.length > 0) return [words.join(' ')];
	if (stdinText === undefined) return [];
	return stdinText.split(/\r?\n/).filter((line) => line.trim() !== '');
}

/**
 * Write each message over one client, then close it. The signal bounds
 * connecting, not the writes themselves.
 */
export async function sendMessages(
	config: SyslogClientConfig,
	messages: Message[],
	signal?: AbortSignal,
): Promise<ResolvedSettings | null> {
	const client = new SyslogClient(config);
	try {
		for (const message of messages) {
			await client.write(message, { signal });
		}
		return client.settings;
	} finally {
		await client.close();
	}
}

// ─── Command registration ────────────────────────────────────────────────────

export function registerSendCommand(program: Command): void {
	addMessageOptions(
		program
			.command('send')
			.description('Send a message to a syslog receiver')
			.argument('[message...]', 'Message text (default: read lines from stdin)'),
	)
		.option('--timeout <duration>', 'Connect timeout, e.g. 500ms or 5s', '5s')
		.action(async (words: string[], opts: SendOptions, cmd: Command) => {
			try {
				const fileConfig = await loadCliConfig({ configPath: globalConfigPath(cmd) });
				const loggerConfig = buildLoggerConfig(fileConfig, opts);
				const timeoutMs = parseDuration(opts.timeout);

				const stdinText = words.length === 0 && !process.stdin.isTTY ? await text(process.stdin) : undefined;
				const bodies = collectBodies(words, stdinText);
				if (bodies.length === 0) {
					output.error('No message given. Pass message words or pipe lines on stdin.');
					process.exitCode = 1;
					return;
				}

				const messages = bodies.map((body) => buildMessage(body, opts, loggerConfig));
				const settings = await sendMessages(
					toClientConfig(loggerConfig, { onLog: output.debug }),
					messages,
					AbortSignal.timeout(timeoutMs),
				);

				if (output.isJsonMode()) {
					output.json({ sent: messages.length, settings });
					return;
				}
				const via = settings ? ` via ${settings.network} (${settings.protocol}, framing=${settings.framing})` : '';
				output.success(`Sent ${messages.length} message${messages.length === 1 ? '' : 's'}${via}`);
			} catch (err) {
				output.error(`Send failed: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
