import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const root = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
    resolve: {
        alias: [
            { find: /^@\//, replacement: join(root, 'apps/cli/src') + '/' },
            { find: '@pushwatch/protocol', replacement: join(root, 'packages/protocol/src/index.ts') },
        ],
    },
    test: {
        include: ['apps/cli/src/**/*.test.ts', 'packages/protocol/src/**/*.test.ts'],
        environment: 'node',
        env: {
            PUSHWATCH_HOME_DIR: join(tmpdir(), `pushwatch-vitest-${process.pid}`),
            PUSHWATCH_LOG_CONSOLE: '0',
        },
    },
});
