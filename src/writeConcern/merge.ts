import type { WriteConcernConfig } from './config'
import { setsAcknowledgement } from './normalize'
import type { WriteConcernOptions, WriteConcernSource } from './types'

export type WriteConcernInputs = Readonly<{
    override?: Readonly<WriteConcernOptions> | null
    config?: WriteConcernConfig | null
}>

export type ResolvedWriteConcern = Readonly<{
    options: WriteConcernOptions
    source: WriteConcernSource
}>

/**
 * Effective write concern for one call. First match wins:
 * explicit options > context override > configured default > safe-mode flag.
 * Only the last branch guarantees `w` is present.
 */
export function resolveWriteConcern(
    explicit: WriteConcernOptions | null | undefined,
    inputs: WriteConcernInputs = {}
): ResolvedWriteConcern {
    const options = explicit ?? {}
    if (setsAcknowledgement(options)) {
        return { options, source: 'explicit' }
    }

    if (inputs.override) {
        return { options: { ...options, ...inputs.override }, source: 'override' }
    }

    const defaultWriteConcern = inputs.config?.defaultWriteConcern
    if (defaultWriteConcern) {
        return { options: { ...options, ...defaultWriteConcern }, source: 'default' }
    }

    return {
        options: { ...options, w: inputs.config?.persistInSafeMode ? 1 : 0 },
        source: 'safeMode'
    }
}

export function mergeWriteConcern(
    explicit: WriteConcernOptions | null | undefined,
    inputs?: WriteConcernInputs
): WriteConcernOptions {
    return resolveWriteConcern(explicit, inputs).options
}
