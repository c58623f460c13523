import path from 'node:path'
import { defineConfig } from 'vitest/config'

export default defineConfig({
    resolve: {
        alias: {
            '#shared': path.resolve(__dirname, 'src/shared/index.ts'),
            '#writeConcern': path.resolve(__dirname, 'src/writeConcern/index.ts'),
            '#backend': path.resolve(__dirname, 'src/backend/index.ts')
        }
    },
    test: {
        include: ['tests/**/*.test.ts']
    }
})
