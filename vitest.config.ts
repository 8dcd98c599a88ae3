import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '~': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
    test: {
        include: [ 'test/**/*.spec.ts' ],
        environment: 'node',
        setupFiles: [ 'test/setup.ts' ],
        testTimeout: 10000,
    },
});
