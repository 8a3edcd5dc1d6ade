#!/usr/bin/env node

/**
 * syslogkit CLI: send, inspect and preview SYSLOG messages.
 *
 * Entry point that sets up Commander.js with all commands and global flags.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { registerFormatCommand } from './commands/format.js';
import { registerSendCommand } from './commands/send.js';
import { registerTargetsCommand } from './commands/targets.js';
import { setJsonMode, setQuietMode, setVerboseMode } from './output.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

async function getVersion(): Promise<string> {
	try {
		const pkgPath = resolve(__dirname, '..', 'package.json');
		const content = await readFile(pkgPath, 'utf-8');
		const pkg: unknown = JSON.parse(content);
		if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
			return pkg.version;
		}
		return '0.0.0';
	} catch {
		return '0.0.0';
	}
}

async function main(): Promise<void> {
	const version = await getVersion();

	const program = new Command();

	program
		.name('syslogkit')
		.description('Send messages to syslog receivers')
		.version(version, '-V, --version', 'Print version number')
		.option('-c, --config <path>', 'Path to syslogkit.yaml')
		.option('-v, --verbose', 'Show connection diagnostics')
		.option('--json', 'Output as JSON (for scripting)')
		.option('--quiet', 'Errors only')
		.hook('preAction', (thisCommand) => {
			const opts = thisCommand.opts();
			if (opts.json) setJsonMode(true);
			if (opts.verbose) setVerboseMode(true);
			if (opts.quiet) setQuietMode(true);
		});

	registerSendCommand(program);
	registerTargetsCommand(program);
	registerFormatCommand(program);

	await program.parseAsync(process.argv);
}

main().catch((err) => {
	console.error('Fatal error:', err instanceof Error ? err.message : String(err));
	process.exitCode = 1;
});
