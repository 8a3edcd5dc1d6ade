import { describe, expect, it } from 'vitest';
import { createBackoff, ExponentialBackoff, FixedBackoff, LinearBackoff } from '../backoff.js';
import { ConfigurationError } from '../errors.js';

describe('ExponentialBackoff', () => {
	it('doubles up to the maximum', () => {
		const backoff = new ExponentialBackoff({ initialDelayMs: 100, maxDelayMs: 500 });
		expect([1, 2, 3, 4, 5].map(() => backoff.nextDelay())).toEqual([100, 200, 400, 500, 500]);
	});

	it('starts over after reset', () => {
		const backoff = new ExponentialBackoff({ initialDelayMs: 100, maxDelayMs: 500 });
		backoff.nextDelay();
		backoff.nextDelay();
		backoff.reset();
		expect(backoff.nextDelay()).toBe(100);
	});

	it('defaults to 5s doubling up to 2m', () => {
		const backoff = new ExponentialBackoff();
		const delays = Array.from({ length: 7 }, () => backoff.nextDelay());
		expect(delays).toEqual([5_000, 10_000, 20_000, 40_000, 80_000, 120_000, 120_000]);
	});

	it('stays at zero for a zero initial delay', () => {
		const backoff = new ExponentialBackoff({ initialDelayMs: 0 });
		for (let i = 0; i < 2000; i++) backoff.nextDelay();
		expect(backoff.nextDelay()).toBe(0);
	});
});

describe('LinearBackoff', () => {
	it('grows by the initial delay each attempt', () => {
		const backoff = new LinearBackoff({ initialDelayMs: 100, maxDelayMs: 250 });
		expect([1, 2, 3].map(() => backoff.nextDelay())).toEqual([100, 200, 250]);
		backoff.reset();
		expect(backoff.nextDelay()).toBe(100);
	});
});

describe('FixedBackoff', () => {
	it('always returns the same delay', () => {
		const backoff = new FixedBackoff(42);
		expect(backoff.nextDelay()).toBe(42);
		backoff.reset();
		expect(backoff.nextDelay()).toBe(42);
	});
});

describe('createBackoff()', () => {
	it('builds an exponential policy by default', () => {
		const backoff = createBackoff({ initial_delay: '1s', max_delay: '3s' });
		expect(backoff).toBeInstanceOf(ExponentialBackoff);
		expect([1, 2, 3].map(() => backoff.nextDelay())).toEqual([1_000, 2_000, 3_000]);
	});

	it('accepts numeric milliseconds', () => {
		const backoff = createBackoff({ strategy: 'fixed', initial_delay: 250 });
		expect(backoff).toBeInstanceOf(FixedBackoff);
		expect(backoff.nextDelay()).toBe(250);
	});

	it('builds a linear policy', () => {
		expect(createBackoff({ strategy: 'linear' })).toBeInstanceOf(LinearBackoff);
	});

	it('rejects malformed durations', () => {
		expect(() => createBackoff({ initial_delay: 'soon' })).toThrow(ConfigurationError);
		expect(() => createBackoff({ max_delay: '5 minutes' })).toThrow('invalid backoff max_delay: "5 minutes"');
	});
});
