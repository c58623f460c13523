export type {
    Entity,
    WriteAction,
    UpdateItem,
    WriteRequest,
    WriteResult,
    WriteRecord,
    WriteBackend
} from './types'

export { MemoryWriteBackend, createMemoryBackend } from './memory'
export type { CreateMemoryBackendOptions } from './memory'
