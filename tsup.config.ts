import { defineConfig } from 'tsup'

/**
 * Bundled build for skyrelay
 *
 * - splitting: true → shared code goes to chunk-*.js files
 * - Unified build → all entries share common chunks
 *
 * The CLI is not bundled; `npm run build` compiles it with tsc.
 */
export default defineConfig({
    name: 'skyrelay',

    entry: {
        // ==================== Main Entries ====================
        // Default entry (includes all modules, suitable for Node.js)
        index: 'index.ts',

        // Explicit Node.js entry (adds the CSV file logger)
        node: 'node.ts',

        // Browser-safe entry (excludes Node.js-dependent modules)
        browser: 'browser.ts',

        // ==================== Sub-path Exports ====================
        'src/core': 'src/core/index.ts',
        'src/models': 'src/models/index.ts',
        'src/network': 'src/network/index.ts',
        'src/simulation': 'src/simulation/index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: true,
    treeshake: true,

    sourcemap: false,
    clean: true,

    // Node.js built-ins are resolved at runtime; browser.ts never reaches them
    external: [
        'fs',
        'path',
    ],

    outDir: 'dist',
    target: 'es2020',

    platform: 'neutral',
})
