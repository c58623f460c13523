import { defineConfig } from 'tsup'

export default defineConfig({
    entry: {
        index: 'src/index.ts'
    },
    format: ['esm'],
    dts: true,
    splitting: false,
    sourcemap: true,
    clean: true,
    treeshake: true,
    esbuildOptions(options) {
        options.alias = {
            ...(options.alias ?? {}),
            '#shared': './src/shared/index.ts',
            '#writeConcern': './src/writeConcern/index.ts',
            '#backend': './src/backend/index.ts'
        }
    },
    external: [
        'immer',
        'zod'
    ]
})
