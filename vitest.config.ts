import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/*.test.ts'],
        includeSource: ['src/**/*.ts'],
        environment: 'node',
    },
});
