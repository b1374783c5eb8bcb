import swc from 'unplugin-swc';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    // esbuild renames function expressions that shadow an outer binding
    // (`const ping = bind(function ping() {})` becomes `ping2`); swc keeps the names.
    plugins: [swc.vite()],
    test: {
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        testTimeout: 10000,
    },
});
