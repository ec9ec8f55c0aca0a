import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: [
            'packages/*/src/tests/**/*.test.ts',
            'apps/*/src/tests/**/*.test.ts',
        ],
        exclude: ['**/node_modules/**', '**/dist/**'],
        restoreMocks: true,
    },
});
