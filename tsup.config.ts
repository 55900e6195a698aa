import { defineConfig } from 'tsup';

export default defineConfig([{
    entry: {
        index: 'src/index.ts',
    },
    format: ['esm', 'cjs'],
    dts: true,
    sourcemap: false,
    clean: true,
    treeshake: true,
    outDir: 'dist/bundle',
    skipNodeModulesBundle: true
}, {
    // Release bundle: dbg() fixed to a no-op
    entry: {
        index: 'src/index.ts',
    },
    format: ['esm', 'cjs'],
    define: { __TICKLOG_DEBUG__: 'false' },
    dts: true,
    sourcemap: false,
    clean: true,
    minify: true,
    treeshake: true,
    outDir: 'dist/release',
    skipNodeModulesBundle: true
}]);
