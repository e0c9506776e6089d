import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

export default defineConfig({
    plugins: [react()],
    test: {
        environment: 'node',
        setupFiles: ['./test/setup.ts'],
        globals: true,
        include: ['fusion/**/*.test.ts', 'server/**/*.test.ts'],
    },
});
