// tsup.config.ts
import {defineConfig} from 'tsup';

const shared = {
    outDir: 'dist',
    format: ['esm', 'cjs'] as ('esm' | 'cjs')[],
    sourcemap: true,
    target: 'node20',
    platform: 'node' as const,
    treeshake: true,
    splitting: false,
    outExtension({format}: { format: string }) {
        return {
            js: format === 'esm' ? '.mjs' : '.cjs',
        };
    },
};

export default defineConfig([
    {
        ...shared,
        entry: ['src/index.ts'],
        dts: true,
        clean: true,
    },

    // CLI build (brine command)
    {
        ...shared,
        entry: {
            cli: 'src/cli/main.ts',
        },
        dts: false,
        clean: false, // keep the library build
        banner: {
            js: '#!/usr/bin/env node',
        },
    },
    {
        ...shared,
        entry: {
            ast: 'src/ast/index.ts',
        },
        dts: true,
        clean: false,
    },
]);
