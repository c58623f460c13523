export * from './writeConcern'
export * from './backend'
export * from './store'
export { createCodedError, isCodedError, createNoopLogger } from './shared'
export type { CodedError, ErrorCode, Logger, LogMeta } from './shared'
