export { createCodedError, isCodedError } from './errors'
export type { CodedError, ErrorCode } from './errors'

export { createContextId } from './id'

export { z, formatZodErrorMessage, parseOrThrow } from './zod'

export { createNoopLogger, childLogger } from './logger'
export type { Logger, LogMeta } from './logger'
