import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration for the workspace.
 *
 * Tests live beside the code they cover in `__tests__/` directories, in the
 * backend and in the plugin packages alike. The env block satisfies the
 * config schema in `apps/backend/src/config/env.ts`; no test reaches these
 * addresses.
 */
export default defineConfig({
    test: {
        environment: 'node',
        include: [
            'apps/**/src/**/__tests__/**/*.test.ts',
            'packages/**/src/**/__tests__/**/*.test.ts'
        ],
        exclude: ['**/node_modules/**', 'dist', '**/*.d.ts'],
        testTimeout: 30_000,
        hookTimeout: 30_000,
        reporters: 'default',
        env: {
            NODE_ENV: 'test',
            MONGODB_URI: 'mongodb://localhost:27017/test',
            REDIS_URL: 'redis://localhost:6379'
        }
    }
});
