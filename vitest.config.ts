import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const src = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url))

export default defineConfig({
	resolve: {
		alias: {
			'@sluice/core': src('core'),
			'@sluice/app': src('app'),
			sluice: src('sluice'),
		},
	},
	test: {
		include: ['packages/*/tests/**/*.test.ts'],
	},
})
