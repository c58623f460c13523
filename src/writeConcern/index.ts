export type { W, WriteConcernOptions, WriteConcernSpec, WriteConcernSource, WriteContext } from './types'

export {
    ACKNOWLEDGEMENT_KEYS,
    normalizeWriteConcernSpec,
    unsafeWriteConcern,
    setsAcknowledgement,
    isAcknowledged
} from './normalize'

export { writeConcernOptionsSchema, writeConcernConfigSchema, defineWriteConcernConfig } from './config'
export type { WriteConcernConfig, WriteConcernConfigInput } from './config'

export { resolveWriteConcern, mergeWriteConcern } from './merge'
export type { WriteConcernInputs, ResolvedWriteConcern } from './merge'

export { ContextOverrideStore, createWriteContext } from './OverrideStore'

export { SafetyProxy } from './SafetyProxy'
export type { SafetyScope, SafeOperation } from './SafetyProxy'

export { WriteConcernRuntime } from './WriteConcernRuntime'
export type { WriteConcernRuntimeOptions } from './WriteConcernRuntime'
