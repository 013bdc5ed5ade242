import { defineConfig } from 'tsup'

/**
 * Bundled build for fogsim
 *
 * - index: browser-safe library entry (no file system access)
 * - node: adds event log persistence
 * - cli: `fogsim` executable (CommonJS only, it checks `require.main`)
 */
export default defineConfig([
    {
        name: 'fogsim',

        entry: {
            // ==================== Main Entries ====================
            index: 'index.ts',
            node: 'node.ts',

            // ==================== Sub-path Exports ====================
            'src/core': 'src/core/index.ts',
            'src/fog': 'src/fog/index.ts',
        },

        format: ['cjs', 'esm'],
        dts: true,

        splitting: true,
        treeshake: true,

        sourcemap: false,

        // Node.js built-ins are resolved at runtime
        external: [
            'fs',
            'path',
        ],

        outDir: 'dist/bundle',
        target: 'es2020',
        platform: 'node',
    },
    {
        name: 'fogsim-cli',
        entry: { cli: 'src/fog/cli.ts' },
        format: ['cjs'],
        outDir: 'dist/bundle',
        target: 'es2020',
        platform: 'node',
    },
])
