/**
 * syslogkit targets: show where messages would be sent.
 */

import { resolveTargets, type Target } from '@syslogkit/client';
import { type SyslogLoggerConfig, toClientConfig } from '@syslogkit/logger-syslog';
import type { Command } from 'commander';
import { loadCliConfig } from '../config.js';
import { globalConfigPath } from '../global-options.js';
import * as output from '../output.js';

/** Candidate targets for a config, most preferred first */
export function listTargets(config: SyslogLoggerConfig, target?: string): readonly Target[] {
	const effective: SyslogLoggerConfig =
		target === undefined ? config : { ...config, target, network: undefined, address: undefined };
	const clientConfig = toClientConfig(effective);
	return resolveTargets(clientConfig.network, clientConfig.address, clientConfig.platform);
}

export function registerTargetsCommand(program: Command): void {
	program
		.command('targets')
		.description('List the candidate syslog targets in dial order')
		.option('-t, --target <network:address>', 'Syslog target (default: local daemon)')
		.action(async (opts: { target?: string }, cmd: Command) => {
			try {
				const config = await loadCliConfig({ configPath: globalConfigPath(cmd) });
				const targets = listTargets(config, opts.target);

				if (output.isJsonMode()) {
					output.json(targets);
					return;
				}
				output.table(
					[
						{ header: '#', key: 'rank', width: 3 },
						{ header: 'NETWORK', key: 'network', width: 10 },
						{ header: 'ADDRESS', key: 'address', width: 32 },
					],
					targets.map((t, i) => ({ rank: String(i + 1), network: t.network, address: t.address })),
				);
			} catch (err) {
				output.error(`Cannot resolve targets: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
