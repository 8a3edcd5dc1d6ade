/**
 * Configuration loading for the CLI.
 *
 * Reads syslogkit.yaml from --config or the current directory, substitutes
 * ${VAR} references from the environment, and validates the result
 * against the syslog logger schema.
 */

import { access, readFile } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import { ConfigurationError } from '@syslogkit/client';
import { type SyslogLoggerConfig, validateSyslogLoggerConfig } from '@syslogkit/logger-syslog';
import yaml from 'js-yaml';

export const DEFAULT_CONFIG_FILE = 'syslogkit.yaml';

// ─── Env var substitution ────────────────────────────────────────────────────

export function substituteEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
	if (typeof value === 'string') {
		return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
			const envVal = env[varName];
			if (envVal === undefined) {
				throw new ConfigurationError(`Environment variable "${varName}" is not set`);
			}
			return envVal;
		});
	}
	if (Array.isArray(value)) {
		return value.map((item) => substituteEnvVars(item, env));
	}
	if (value !== null && typeof value === 'object') {
		const result: Record<string, unknown> = {};
		for (const [k, v] of Object.entries(value)) {
			result[k] = substituteEnvVars(v, env);
		}
		return result;
	}
	return value;
}

async function fileExists(filePath: string): Promise<boolean> {
	try {
		await access(filePath);
		return true;
	} catch {
		return false;
	}
}

// ─── Public API ──────────────────────────────────────────────────────────────

export interface CliConfigOptions {
	/** Path from the --config flag */
	configPath?: string;
	/** Defaults to process.env */
	env?: NodeJS.ProcessEnv;
	/** Defaults to process.cwd() */
	cwd?: string;
}

/**
 * Resolve the config file path.
 * Priority: --config flag > ./syslogkit.yaml.
 */
export function resolveConfigPath(configPath?: string, cwd: string = process.cwd()): string {
	if (configPath) {
		return isAbsolute(configPath) ? configPath : resolve(cwd, configPath);
	}
	return resolve(cwd, DEFAULT_CONFIG_FILE);
}

/**
 * Load the CLI config. A missing default file yields an empty config; a
 * missing file named with --config is an error.
 *
 * @throws ConfigurationError for unreadable YAML, unset variables or schema violations
 */
export async function loadCliConfig(options: CliConfigOptions = {}): Promise<SyslogLoggerConfig> {
	const configPath = resolveConfigPath(options.configPath, options.cwd);

	if (!(await fileExists(configPath))) {
		if (options.configPath) {
			throw new ConfigurationError(`Configuration file not found: ${configPath}`);
		}
		return {};
	}

	let parsed: unknown;
	try {
		parsed = yaml.load(await readFile(configPath, 'utf-8'));
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		throw new ConfigurationError(`${configPath}: ${reason}`, [reason], { cause: err });
	}
	if (parsed === undefined || parsed === null) {
		return {};
	}

	try {
		return validateSyslogLoggerConfig(substituteEnvVars(parsed, options.env));
	} catch (err) {
		if (err instanceof ConfigurationError) {
			throw new ConfigurationError(`${configPath}: ${err.message}`, err.validationErrors, { cause: err });
		}
		throw err;
	}
}
