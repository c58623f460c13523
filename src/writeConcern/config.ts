import { parseOrThrow, z } from '#shared'
import type { WriteConcernOptions } from './types'

export const writeConcernOptionsSchema = z.looseObject({
    w: z.union([z.number().int(), z.string().min(1)]).optional(),
    wtimeout: z.number().int().nonnegative().optional(),
    fsync: z.boolean().optional(),
    j: z.boolean().optional(),
    journal: z.boolean().optional()
})

export const writeConcernConfigSchema = z.object({
    defaultWriteConcern: writeConcernOptionsSchema.optional(),
    persistInSafeMode: z.boolean().default(false)
})

export type WriteConcernConfigInput = z.input<typeof writeConcernConfigSchema>

/**
 * Process-wide write concern settings, fixed at startup.
 * - defaultWriteConcern: used when neither the call nor an override has an opinion.
 * - persistInSafeMode: last resort, `{ w: 1 }` when true and `{ w: 0 }` otherwise.
 */
export type WriteConcernConfig = Readonly<{
    defaultWriteConcern?: Readonly<WriteConcernOptions>
    persistInSafeMode: boolean
}>

export function defineWriteConcernConfig(input?: unknown): WriteConcernConfig {
    const parsed = parseOrThrow(writeConcernConfigSchema, input ?? {}, { prefix: '[writeConcern] ' })
    const defaultWriteConcern = parsed.defaultWriteConcern
        ? Object.freeze({ ...parsed.defaultWriteConcern })
        : undefined

    return Object.freeze({
        ...(defaultWriteConcern ? { defaultWriteConcern } : {}),
        persistInSafeMode: parsed.persistInSafeMode
    })
}
