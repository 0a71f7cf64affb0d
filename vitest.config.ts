import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['test/**/*.test.ts'],
        coverage: {
            include: ['lib/**/*.ts'],
            reporter: ['text', 'json', 'html'],
            reportsDirectory: './out/test/coverage',
        },
    },
});
