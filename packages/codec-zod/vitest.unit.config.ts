import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'

export default defineConfig({
	resolve: {
		alias: {
			// The publisher's sources import each other through '@/'
			'@': fileURLToPath(new URL('../publisher/src', import.meta.url)),
		},
	},
	test: {
		include: ['tests/**/*.test.ts'],
		testTimeout: 10_000,
	},
})
