/**
 * The compiled CLI resolves sibling workspaces through their `import`
 * condition, so each must point at what its build actually emits.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';

const ROOT = new URL('../../../../', import.meta.url);
const WORKSPACES = ['packages/sdk', 'packages/client', 'loggers/syslog', 'packages/cli'];

async function readJson(path: string): Promise<Record<string, unknown>> {
	const parsed: unknown = JSON.parse(await readFile(fileURLToPath(new URL(path, ROOT)), 'utf-8'));
	if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
		throw new Error(`${path} is not a JSON object`);
	}
	return Object.fromEntries(Object.entries(parsed));
}

describe('workspace packaging', () => {
	it.each(WORKSPACES)('%s exports sources for types and compiled output for import', async (dir) => {
		const pkg = await readJson(`${dir}/package.json`);
		expect(pkg.exports).toEqual({ '.': { types: './src/index.ts', import: './dist/index.js' } });
	});

	it.each(WORKSPACES)('%s compiles src into dist without its tests', async (dir) => {
		const tsconfig = await readJson(`${dir}/tsconfig.json`);
		expect(tsconfig.compilerOptions).toEqual({ composite: true, rootDir: 'src', outDir: 'dist' });
		expect(tsconfig.exclude).toEqual(['src/**/__tests__/**']);
	});

	it('builds every workspace and exposes the compiled CLI', async () => {
		const root = await readJson('package.json');
		expect(root.bin).toEqual({ syslogkit: 'packages/cli/dist/index.js' });
		expect(root.scripts).toMatchObject({ build: `tsc -b ${WORKSPACES.join(' ')}` });

		const cli = await readJson('packages/cli/package.json');
		expect(cli.bin).toEqual({ syslogkit: './dist/index.js' });
	});
});
