import type { WriteConcernOptions, WriteConcernSpec } from './types'

export const ACKNOWLEDGEMENT_KEYS = ['w', 'j', 'fsync', 'wtimeout'] as const

// Any number becomes `w`; whether it is a valid node count is left to the store client.
export function normalizeWriteConcernSpec(spec: WriteConcernSpec = 1): WriteConcernOptions {
    return typeof spec === 'number' ? { w: spec } : { ...spec }
}

export function unsafeWriteConcern(): WriteConcernOptions {
    return { w: 0 }
}

// `false` and nullish values do not count as an opinion; `w: 0` does.
export function setsAcknowledgement(options: WriteConcernOptions): boolean {
    return ACKNOWLEDGEMENT_KEYS.some(key => {
        const value = options[key]
        return value !== undefined && value !== null && value !== false
    })
}

export function isAcknowledged(writeConcern: WriteConcernOptions): boolean {
    return writeConcern.w !== 0
}
