import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

export default defineConfig({
	test: {
		environment: 'node',
		globals: true,
		setupFiles: ['./tests/setup.ts'],
		include: ['tests/**/*.test.ts'],
		exclude: ['**/node_modules/**', '**/dist/**'],
		// Property tests drive fake timers through many runs
		testTimeout: 30000,
		hookTimeout: 10000,
		coverage: {
			provider: 'v8',
			reporter: ['text', 'html', 'lcov'],
			reportsDirectory: './coverage',
			include: ['src/**/*.ts', '!src/**/*.d.ts'],
			exclude: ['node_modules', 'tests', '**/*.d.ts', '**/*.config.*']
		}
	},
	resolve: {
		alias: {
			$lib: resolve('./src/lib')
		}
	}
});
