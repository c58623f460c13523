export { MemoryWriteBackend } from './MemoryWriteBackend'
export { createMemoryBackend } from './createMemoryBackend'
export type { CreateMemoryBackendOptions } from './createMemoryBackend'
