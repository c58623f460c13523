import type { WriteResult } from '#backend'
import type { WriteConcernOptions, WriteContext } from '#writeConcern'

/**
 * Per-call write settings.
 * - writeConcern: explicit options; they win when they set an acknowledgment key.
 * - context: the context handed out by `SafetyProxy.run`, carrying its override.
 */
export type WriteCallOptions = Readonly<{
    writeConcern?: WriteConcernOptions
    context?: WriteContext
}>

export type WriteOutcome = WriteResult
