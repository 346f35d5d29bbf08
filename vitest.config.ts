import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['lib/**/*.test.ts', 'packages/**/*.test.ts'],
        environment: 'node',
        testTimeout: 10_000,
        env: {
            RL_LOG_LEVEL: 'silent',
        },
    },
});
