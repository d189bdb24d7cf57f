import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['server/**/*.test.ts', 'shared/**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
        // Alias resolution matching tsconfig paths
        alias: {
            '@shared': fileURLToPath(new URL('./shared', import.meta.url)),
        },
    },
});
