import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		// Enable Vitest's built-in globals API (describe, it, expect), no need for manual import
		globals: true,
		environment: 'node',
		include: ['src/**/*.test.ts'],
	},
});
