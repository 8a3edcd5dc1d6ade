/**
 * JSON Schema for the syslog logger's config block, and its validator.
 */

import type { BackoffConfig, BomMode, Framing, Protocol } from '@syslogkit/client';
import { ConfigurationError } from '@syslogkit/client';
import AjvModule from 'ajv';

const Ajv = AjvModule.default;

export interface SyslogLoggerConfig {
	/** "network:address", e.g. "udp:127.0.0.1:514". Empty autodetects the local daemon. */
	target?: string;
	network?: string;
	address?: string;
	facility?: string;
	protocol?: Protocol;
	framing?: Framing;
	bom?: BomMode;
	host_name?: string;
	process_name?: string;
	utc?: boolean;
	backoff?: BackoffConfig;
}

const durationSchema = {
	oneOf: [
		{ type: 'integer', minimum: 0 },
		{ type: 'string', pattern: '^\\d+(ms|s|m|h|d)$' },
	],
};

export const syslogLoggerConfigSchema = {
	type: 'object',
	properties: {
		target: {
			type: 'string',
			description: 'Syslog target as network:address (unixgram:/dev/log, udp:127.0.0.1:514). Empty means the local system daemon.',
		},
		network: {
			type: 'string',
			enum: ['', 'udp', 'udp4', 'udp6', 'tcp', 'tcp4', 'tcp6', 'unix', 'unixgram'],
			description: 'Transport; overrides the network part of target.',
		},
		address: {
			type: 'string',
			description: 'host[:port] or socket path; overrides the address part of target.',
		},
		facility: {
			type: 'string',
			description: 'Syslog facility name (kern, user, daemon, local0..local7, ...).',
			default: 'local0',
		},
		protocol: {
			type: 'string',
			enum: ['auto', 'v0-local', 'v0-net', 'v1-net'],
			default: 'auto',
		},
		framing: {
			type: 'string',
			enum: ['auto', 'length', 'nul', 'lf', 'none'],
			default: 'auto',
		},
		bom: {
			type: 'string',
			enum: ['auto', 'always', 'never'],
			default: 'auto',
		},
		host_name: {
			type: 'string',
			pattern: '^\\S*$',
			description: 'HOSTNAME field. Defaults to the machine hostname.',
		},
		process_name: {
			type: 'string',
			pattern: '^\\S*$',
			description: 'APP-NAME field. Defaults to the running program name.',
		},
		utc: {
			type: 'boolean',
			description: 'Render timestamps in UTC instead of the local offset.',
			default: false,
		},
		backoff: {
			type: 'object',
			properties: {
				strategy: { type: 'string', enum: ['exponential', 'linear', 'fixed'] },
				initial_delay: durationSchema,
				max_delay: durationSchema,
			},
			additionalProperties: false,
		},
	},
	additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validateConfig = ajv.compile<SyslogLoggerConfig>(syslogLoggerConfigSchema);

/** @throws ConfigurationError listing every schema violation */
export function validateSyslogLoggerConfig(config: unknown): SyslogLoggerConfig {
	if (validateConfig(config)) {
		return config;
	}
	const errors = (validateConfig.errors ?? []).map(
		(e) => `${e.instancePath || '(root)'} ${e.message ?? 'is invalid'}`,
	);
	throw new ConfigurationError(`Invalid syslog logger config: ${errors.join('; ')}`, errors);
}
