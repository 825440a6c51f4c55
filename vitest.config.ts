import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['planner_core/__tests__/**/*.test.ts'],
        clearMocks: true,
    },
});
