import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		name: 'highlighter',
		include: ['src/**/*.test.ts'],
		exclude: ['**/node_modules/**'],
		environment: 'node',
	},
})
