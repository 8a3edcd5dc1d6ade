/**
 * Reconnect backoff policies.
 *
 * A policy hands out the delay to wait before the next reconnect attempt
 * and is reset once a write succeeds.
 */

import { type DurationString, parseDuration } from '@syslogkit/sdk';
import { ConfigurationError } from './errors.js';

export interface BackoffPolicy {
	/** Delay in ms before the next attempt; advances the policy's state. */
	nextDelay(): number;
	reset(): void;
}

export interface BackoffOptions {
	/** Delay after the first failure, in ms (default: 5000) */
	initialDelayMs?: number;
	/** Upper bound for any delay, in ms (default: 120_000) */
	maxDelayMs?: number;
}

export class ExponentialBackoff implements BackoffPolicy {
	private readonly initialDelayMs: number;
	private readonly maxDelayMs: number;
	private attempts = 0;

	constructor(options: BackoffOptions = {}) {
		this.initialDelayMs = options.initialDelayMs ?? 5_000;
		this.maxDelayMs = options.maxDelayMs ?? 120_000;
	}

	nextDelay(): number {
		const delay = Math.min(this.initialDelayMs * 2 ** this.attempts, this.maxDelayMs);
		if (delay > 0 && delay < this.maxDelayMs) this.attempts++;
		return delay;
	}

	reset(): void {
		this.attempts = 0;
	}
}

export class LinearBackoff implements BackoffPolicy {
	private readonly initialDelayMs: number;
	private readonly maxDelayMs: number;
	private attempts = 0;

	constructor(options: BackoffOptions = {}) {
		this.initialDelayMs = options.initialDelayMs ?? 5_000;
		this.maxDelayMs = options.maxDelayMs ?? 120_000;
	}

	nextDelay(): number {
		this.attempts++;
		return Math.min(this.initialDelayMs * this.attempts, this.maxDelayMs);
	}

	reset(): void {
		this.attempts = 0;
	}
}

export class FixedBackoff implements BackoffPolicy {
	constructor(private readonly delayMs: number) {}

	nextDelay(): number {
		return this.delayMs;
	}

	reset(): void {}
}

// ─── Config ──────────────────────────────────────────────────────────────────

export type BackoffStrategy = 'exponential' | 'linear' | 'fixed';

export interface BackoffConfig {
	strategy?: BackoffStrategy;
	/** ms, or a duration string such as "5s" */
	initial_delay?: number | DurationString;
	max_delay?: number | DurationString;
}

function toMs(value: number | DurationString | undefined, field: string): number | undefined {
	if (value === undefined || typeof value === 'number') return value;
	try {
		return parseDuration(value);
	} catch (err) {
		throw new ConfigurationError(`invalid backoff ${field}: "${value}"`, [], { cause: err });
	}
}

/** Build a policy from declarative config (YAML / JSON). */
export function createBackoff(config: BackoffConfig = {}): BackoffPolicy {
	const initialDelayMs = toMs(config.initial_delay, 'initial_delay');
	const maxDelayMs = toMs(config.max_delay, 'max_delay');

	switch (config.strategy ?? 'exponential') {
		case 'linear':
			return new LinearBackoff({ initialDelayMs, maxDelayMs });
		case 'fixed':
			return new FixedBackoff(initialDelayMs ?? 5_000);
		default:
			return new ExponentialBackoff({ initialDelayMs, maxDelayMs });
	}
}
