import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['src/**/*.test.ts'],
        exclude: [
            'node_modules/',
            'dist/',
            'output/'
        ],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'json', 'html'],
            exclude: [
                'node_modules/',
                'dist/',
                'output/',
                '**/*.test.ts',
                'src/tests/fixtures/**'
            ]
        }
    }
});
