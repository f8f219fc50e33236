import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@shared': path.resolve(__dirname, 'shared'),
        },
    },
    test: {
        environment: 'node',
        include: ['src/**/*.test.ts', 'shared/**/*.test.ts'],
        testTimeout: 15000,
    },
});
