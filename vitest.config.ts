import { fileURLToPath } from 'node:url'

import { defineConfig } from 'vitest/config'

export default defineConfig({
	cacheDir: './.vitest',
	resolve: {
		alias: {
			'#utils': fileURLToPath(new URL('./src/utils', import.meta.url)),
		},
	},
	test: {
		environment: 'node',
		testTimeout: 20000,
		hookTimeout: 20000,
		// Prefer explicit imports over implicit globals for clarity
		globals: false,
		setupFiles: ['./tests/vitest/vitest-setup.ts'],
		include: ['src/**/*.{test,spec}.ts', 'tests/**/*.{test,spec}.ts'],
		exclude: ['dist/**', '**/node_modules/**', '**/*.d.ts'],
		isolate: true,
		pool: 'threads',
		allowOnly: false,
		coverage: {
			provider: 'v8',
			reporter: ['text-summary', 'html'],
			reportsDirectory: './coverage',
			exclude: [
				'src/**/*.d.ts',
				'**/*.test.*',
				'dist/**',
				'vitest.config.*',
				'tests/**',
				'src/cli/**',
			],
		},
		// Randomize order to catch hidden state coupling (stable seed in CI)
		sequence: {
			shuffle: true,
			...(process.env.CI ? { seed: 20241118 } : {}),
		},
	},
})
