import type { Command } from 'commander';

/** The root program's --config value, seen from a subcommand */
export function globalConfigPath(cmd: Command): string | undefined {
	const config: unknown = cmd.parent?.opts().config;
	return typeof config === 'string' ? config : undefined;
}
