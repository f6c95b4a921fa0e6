import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		name: 'search-lens',
		include: ['src/**/*.test.ts'],
		environment: 'node',
		server: {
			deps: {
				inline: ['@lensline/logger', '@lensline/settings', 'zod'],
			},
		},
	},
})
