import type { Logger } from '#shared'
import type { Entity } from '../types'
import { MemoryWriteBackend } from './MemoryWriteBackend'

export type CreateMemoryBackendOptions<T extends Entity> = Readonly<{
    key?: string
    seed?: Readonly<Record<string, T[]>>
    logger?: Logger
}>

export function createMemoryBackend<T extends Entity>(options?: CreateMemoryBackendOptions<T>): MemoryWriteBackend<T> {
    const key = (typeof options?.key === 'string' && options.key.trim()) ? options.key.trim() : 'memory'

    return new MemoryWriteBackend<T>({
        key,
        ...(options?.seed ? { seed: options.seed } : {}),
        ...(options?.logger ? { logger: options.logger } : {})
    })
}
