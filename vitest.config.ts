import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

/** Workspace packages resolve to their TypeScript sources, so tests need no build */
function source(dir: string): string {
	return fileURLToPath(new URL(`./${dir}/src/index.ts`, import.meta.url));
}

export default defineConfig({
	resolve: {
		alias: {
			'@syslogkit/sdk': source('packages/sdk'),
			'@syslogkit/client': source('packages/client'),
			'@syslogkit/logger-syslog': source('loggers/syslog'),
			'@syslogkit/cli': source('packages/cli'),
		},
	},
	test: {
		include: ['packages/*/src/**/__tests__/**/*.test.ts', 'loggers/*/src/**/__tests__/**/*.test.ts'],
		environment: 'node',
		testTimeout: 10_000,
	},
});
