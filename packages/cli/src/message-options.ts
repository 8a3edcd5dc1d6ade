/**
 * Flags shared by `send` and `format`, and their translation into a
 * logger config and a Message.
 */

import { type Facility, type Message, parseSeverity, type Severity } from '@syslogkit/client';
import { resolveFacility, type SyslogLoggerConfig, validateSyslogLoggerConfig } from '@syslogkit/logger-syslog';
import type { Command } from 'commander';

/** APP-NAME used when neither the config nor --tag names one */
export const DEFAULT_TAG = 'syslogkit';

export interface MessageOptions {
	target?: string;
	severity: string;
	facility?: string;
	protocol?: string;
	framing?: string;
	bom?: string;
	hostname?: string;
	tag?: string;
	msgid?: string;
	sd?: string;
	utc?: boolean;
}

export function addMessageOptions(command: Command): Command {
	return command
		.option('-t, --target <network:address>', 'Syslog target, e.g. udp:127.0.0.1:514 (default: local daemon)')
		.option('-s, --severity <name>', 'Message severity', 'info')
		.option('-f, --facility <name>', 'Message facility (default: local0)')
		.option('--protocol <protocol>', 'auto, v0-local, v0-net or v1-net')
		.option('--framing <framing>', 'auto, length, nul, lf or none')
		.option('--bom <mode>', 'auto, always or never')
		.option('--hostname <name>', 'HOSTNAME field (default: this machine)')
		.option('--tag <name>', `APP-NAME field (default: ${DEFAULT_TAG})`)
		.option('--msgid <id>', 'Message ID')
		.option('--sd <data>', 'Pre-encoded structured data, e.g. [ex@32473 k="v"]')
		.option('--utc', 'Render timestamps in UTC');
}

/**
 * Overlay command-line flags on the file config. A --target replaces any
 * network/address from the file.
 *
 * @throws ConfigurationError when the merged config is invalid
 */
export function buildLoggerConfig(file: SyslogLoggerConfig, opts: MessageOptions): SyslogLoggerConfig {
	const merged: Record<string, unknown> = { process_name: DEFAULT_TAG, ...file };
	if (opts.target !== undefined) {
		delete merged.network;
		delete merged.address;
		merged.target = opts.target;
	}

	const overrides: Record<string, string | boolean | undefined> = {
		facility: opts.facility,
		protocol: opts.protocol,
		framing: opts.framing,
		bom: opts.bom,
		host_name: opts.hostname,
		process_name: opts.tag,
		utc: opts.utc,
	};
	for (const [key, value] of Object.entries(overrides)) {
		if (value !== undefined) merged[key] = value;
	}

	return validateSyslogLoggerConfig(merged);
}

/** @throws ParseError for an unknown severity name */
export function resolveSeverity(name: string): Severity {
	const parsed = parseSeverity(name);
	if (!parsed.ok) throw parsed.error;
	return parsed.value;
}

export function buildMessage(
	body: string,
	opts: MessageOptions,
	config: SyslogLoggerConfig,
	time?: Date,
): Message {
	const facility: Facility = resolveFacility(config.facility);
	return {
		time,
		severity: resolveSeverity(opts.severity),
		facility,
		id: opts.msgid,
		body,
		structuredData: opts.sd,
	};
}
