import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		name: 'node',
		globals: true,
		environment: 'node',
		include: ['test/**/*.test.ts'],
		restoreMocks: true,
	},
});
