/**
 * Error taxonomy for syslogkit.
 *
 * Every error in the client extends SyslogError, giving callers
 * a consistent shape to catch and inspect.
 */

export class SyslogError extends Error {
	readonly code: string;

	constructor(code: string, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'SyslogError';
		this.code = code;
	}
}

/** Unresolvable transport spec or invalid configuration. Fatal to construction. */
export class ConfigurationError extends SyslogError {
	readonly validationErrors: string[];

	constructor(message: string, validationErrors: string[] = [], options?: ErrorOptions) {
		super('CONFIG_ERROR', message, options);
		this.name = 'ConfigurationError';
		this.validationErrors = validationErrors;
	}
}

/** Every dial candidate failed. `cause` is the first candidate's error. */
export class ConnectError extends SyslogError {
	readonly network: string;
	readonly address: string;

	constructor(network: string, address: string, options?: ErrorOptions) {
		const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
		super('CONNECT_ERROR', `cannot connect to syslog at ${network}:${address}${reason}`, options);
		this.name = 'ConnectError';
		this.network = network;
		this.address = address;
	}
}

export class ClosedError extends SyslogError {
	constructor(message = 'writing to a closed syslog client', options?: ErrorOptions) {
		super('CLOSED', message, options);
		this.name = 'ClosedError';
	}
}

/** Raised without any I/O while the client is inside its reconnect window. */
export class BackoffError extends SyslogError {
	readonly retryAfterMs: number;

	constructor(retryAfterMs: number, options?: ErrorOptions) {
		super('BACKOFF', `syslog client is waiting ${retryAfterMs}ms to reconnect`, options);
		this.name = 'BackoffError';
		this.retryAfterMs = retryAfterMs;
	}
}

export class WriteError extends SyslogError {
	constructor(message: string, options?: ErrorOptions) {
		super('WRITE_ERROR', message, options);
		this.name = 'WriteError';
	}
}

export class ParseError extends SyslogError {
	readonly input: string;

	constructor(kind: string, input: string, options?: ErrorOptions) {
		super('PARSE_ERROR', `bad ${kind} string: "${input}"`, options);
		this.name = 'ParseError';
		this.input = input;
	}
}
