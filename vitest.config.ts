import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['collector/**/*.test.ts', 'server/**/*.test.ts'],
        restoreMocks: true
    }
});
