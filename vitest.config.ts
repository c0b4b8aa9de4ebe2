import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        restoreMocks: true,
        unstubEnvs: true,
        coverage: {
            reporter: ['text'],
            include: ['src/**/*.ts'],
            exclude: ['src/cli/index.ts', 'src/cli/commands/**']
        },
        globals: true
    }
});
