import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError } from '@syslogkit/client';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadCliConfig, resolveConfigPath, substituteEnvVars } from '../config.js';

describe('loadCliConfig', () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), 'syslogkit-config-test-'));
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	it('loads syslogkit.yaml from the working directory', async () => {
		await writeFile(join(tempDir, 'syslogkit.yaml'), 'target: tcp:logs.internal:601\nfacility: daemon\nutc: true\n');

		const config = await loadCliConfig({ cwd: tempDir });
		expect(config).toEqual({ target: 'tcp:logs.internal:601', facility: 'daemon', utc: true });
	});

	it('substitutes environment variables', async () => {
		await writeFile(join(tempDir, 'syslogkit.yaml'), 'target: udp:${SYSLOG_HOST}:514\nhost_name: ${NODE_NAME}\n');

		const config = await loadCliConfig({ cwd: tempDir, env: { SYSLOG_HOST: '10.0.0.5', NODE_NAME: 'web-1' } });
		expect(config).toEqual({ target: 'udp:10.0.0.5:514', host_name: 'web-1' });
	});

	it('accepts a backoff block with duration strings', async () => {
		await writeFile(join(tempDir, 'syslogkit.yaml'), 'backoff:\n  strategy: fixed\n  initial_delay: 2s\n');

		const config = await loadCliConfig({ cwd: tempDir });
		expect(config.backoff).toEqual({ strategy: 'fixed', initial_delay: '2s' });
	});

	it('resolves --config relative to the working directory', async () => {
		await writeFile(join(tempDir, 'custom.yaml'), 'facility: user\n');

		const config = await loadCliConfig({ cwd: tempDir, configPath: 'custom.yaml' });
		expect(config).toEqual({ facility: 'user' });
	});

	it('returns an empty config when the default file is absent', async () => {
		expect(await loadCliConfig({ cwd: tempDir })).toEqual({});
	});

	it('returns an empty config for an empty file', async () => {
		await writeFile(join(tempDir, 'syslogkit.yaml'), '');
		expect(await loadCliConfig({ cwd: tempDir })).toEqual({});
	});

	it('fails when the --config file is absent', async () => {
		await expect(loadCliConfig({ cwd: tempDir, configPath: 'missing.yaml' })).rejects.toThrow(
			`Configuration file not found: ${join(tempDir, 'missing.yaml')}`,
		);
	});

	it('fails on an unset environment variable', async () => {
		await writeFile(join(tempDir, 'syslogkit.yaml'), 'target: udp:${NOT_SET_ANYWHERE}\n');

		await expect(loadCliConfig({ cwd: tempDir, env: {} })).rejects.toThrow(
			'Environment variable "NOT_SET_ANYWHERE" is not set',
		);
	});

	it('reports schema violations with the file path', async () => {
		await writeFile(join(tempDir, 'syslogkit.yaml'), 'transport: udp\n');

		const err = await loadCliConfig({ cwd: tempDir }).catch((e: unknown) => e);
		expect(err).toBeInstanceOf(ConfigurationError);
		if (err instanceof ConfigurationError) {
			expect(err.message.startsWith(join(tempDir, 'syslogkit.yaml'))).toBe(true);
			expect(err.validationErrors).toEqual(['(root) must NOT have additional properties']);
		}
	});

	it('reports YAML syntax errors as configuration errors', async () => {
		await writeFile(join(tempDir, 'syslogkit.yaml'), 'target: [unclosed\n');

		await expect(loadCliConfig({ cwd: tempDir })).rejects.toThrow(ConfigurationError);
	});
});

describe('resolveConfigPath', () => {
	it('keeps absolute paths', () => {
		expect(resolveConfigPath('/etc/syslogkit.yaml', '/srv')).toBe('/etc/syslogkit.yaml');
	});

	it('defaults to syslogkit.yaml in the working directory', () => {
		expect(resolveConfigPath(undefined, '/srv')).toBe('/srv/syslogkit.yaml');
	});
});

describe('substituteEnvVars', () => {
	it('walks nested objects and arrays', () => {
		const env = { A: 'x', B: 'y' };
		expect(substituteEnvVars({ one: '${A}', list: ['${B}-z', 3], nested: { flag: true } }, env)).toEqual({
			one: 'x',
			list: ['y-z', 3],
			nested: { flag: true },
		});
	});
});
