import { configDefaults, defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		exclude: [...configDefaults.exclude, '**/*.config.ts'],
		coverage: {
			exclude: [
				...(configDefaults.coverage.exclude ?? []),
				'**/*.config.ts',
				'**/testing/**',
				// Re-export entry points (no executable code)
				'src/index.ts',
				// Type-only files (no executable code)
				'src/types/**/*.ts'
			],
			reporter: ['lcov', 'text']
		},
		globals: true
	}
})
