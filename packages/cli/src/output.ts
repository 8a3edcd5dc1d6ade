/**
 * Terminal output helpers. Every command prints through here so the
 * --json and --quiet flags apply uniformly.
 */

import chalk from 'chalk';

let jsonMode = false;
let quietMode = false;
let verboseMode = false;

export function setJsonMode(enabled: boolean): void {
	jsonMode = enabled;
}

export function setQuietMode(enabled: boolean): void {
	quietMode = enabled;
}

export function setVerboseMode(enabled: boolean): void {
	verboseMode = enabled;
}

export function isJsonMode(): boolean {
	return jsonMode;
}

// ─── Messages ────────────────────────────────────────────────────────────────

export function success(message: string): void {
	if (jsonMode || quietMode) return;
	console.log(chalk.green(`✓ ${message}`));
}

export function error(message: string): void {
	if (jsonMode) {
		console.error(JSON.stringify({ error: message }));
		return;
	}
	console.error(chalk.red(`✗ ${message}`));
}

/** Client diagnostics; shown with --verbose only, on stderr */
export function debug(message: string): void {
	if (!verboseMode || jsonMode) return;
	console.error(chalk.dim(message));
}

export function heading(text: string): void {
	if (jsonMode || quietMode) return;
	console.log(chalk.bold(text));
}

export function json(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}

// ─── Tables ──────────────────────────────────────────────────────────────────

export interface Column {
	header: string;
	key: string;
	width: number;
}

export function table(columns: Column[], rows: Record<string, string>[]): void {
	if (jsonMode || quietMode) return;
	const header = columns.map((c) => c.header.padEnd(c.width)).join('  ');
	console.log(chalk.bold(header.trimEnd()));
	for (const row of rows) {
		const line = columns.map((c) => (row[c.key] ?? '').padEnd(c.width)).join('  ');
		console.log(line.trimEnd());
	}
}
