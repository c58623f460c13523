export { Collection, createCollection } from './Collection'
export type { CollectionConfig } from './Collection'
export { EntityHandle } from './EntityHandle'
export type { WriteCallOptions, WriteOutcome } from './types'
