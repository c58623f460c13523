import { createContextId } from '#shared'
import type { WriteConcernOptions, WriteContext } from './types'

export function createWriteContext(): WriteContext {
    return Object.freeze({ id: createContextId() })
}

/**
 * Pending overrides, one slot per context id.
 * A slot is emptied by the first `take` or by `clear` when the owning scope exits.
 */
export class ContextOverrideStore {
    private readonly slots = new Map<string, Readonly<WriteConcernOptions>>()

    get size(): number {
        return this.slots.size
    }

    set(context: WriteContext, value: Readonly<WriteConcernOptions>): void {
        this.slots.set(context.id, value)
    }

    get(context: WriteContext | undefined): Readonly<WriteConcernOptions> | undefined {
        if (!context) return undefined
        return this.slots.get(context.id)
    }

    take(context: WriteContext | undefined): Readonly<WriteConcernOptions> | undefined {
        if (!context) return undefined
        const value = this.slots.get(context.id)
        if (value !== undefined) this.slots.delete(context.id)
        return value
    }

    clear(context: WriteContext): boolean {
        return this.slots.delete(context.id)
    }
}
