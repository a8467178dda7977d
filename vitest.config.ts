import { configDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/*.test.ts'],
        exclude: [...configDefaults.exclude, 'dist/**'],
        // Keep winston quiet; tests assert on return values, not log output.
        env: {
            LOG_LEVEL: 'error',
        },
    },
});
