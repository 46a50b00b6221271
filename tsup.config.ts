import { defineConfig } from 'tsup'

/**
 * tsup bundle configuration for turnpath
 *
 * - splitting: shared code goes to chunk-*.js files
 * - browser entry never reaches `fs` or `path`
 */
export default defineConfig({
    name: 'turnpath',

    entry: {
        // ==================== Main Entries ====================
        index: 'index.ts',
        node: 'node.ts',
        browser: 'browser.ts',

        // ==================== Sub-path Exports ====================
        'src/core': 'src/core/index.ts',
        'src/models': 'src/models/index.ts',
        'src/tasks': 'src/tasks/index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: true,
    treeshake: true,

    sourcemap: false,
    clean: true,

    // Node.js built-ins resolve at runtime
    external: [
        'fs',
        'path',
    ],

    outDir: 'dist-bundle',
    target: 'es2020',

    platform: 'neutral',
})
