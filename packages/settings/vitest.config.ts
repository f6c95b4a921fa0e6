import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		name: 'settings',
		include: ['src/**/*.test.ts'],
		environment: 'node',
		server: {
			deps: {
				inline: ['@lensline/logger', 'zod'],
			},
		},
	},
})
