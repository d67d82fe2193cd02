import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['agent/src/**/*.test.ts', 'shared/**/*.test.ts'],
        environment: 'node',
        testTimeout: 20000
    }
});
