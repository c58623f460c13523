import type { Logger } from '#shared'
import { createWriteContext, type ContextOverrideStore } from './OverrideStore'
import type { WriteConcernOptions, WriteContext } from './types'

export type SafetyScope = Readonly<{
    store: ContextOverrideStore
    logger: Logger
}>

export type SafeOperation<R, T> = (receiver: R, context: WriteContext) => T

/**
 * Receiver paired with the override requested by `safely`/`unsafely`.
 * `run`/`runAsync` open a fresh context holding the override, hand it to the
 * operation and clear it when the operation finishes, whichever way it exits.
 */
export class SafetyProxy<R> {
    constructor(
        private readonly scope: SafetyScope,
        readonly receiver: R,
        readonly override: Readonly<WriteConcernOptions>
    ) { }

    /**
     * The slot is cleared as soon as `operation` returns. An async operation must
     * call `resolve` before its first await; otherwise use `runAsync`.
     */
    run<T>(operation: SafeOperation<R, T>): T {
        const context = this.open()
        try {
            return operation(this.receiver, context)
        } finally {
            this.release(context)
        }
    }

    async runAsync<T>(operation: SafeOperation<R, Promise<T>>): Promise<T> {
        const context = this.open()
        try {
            return await operation(this.receiver, context)
        } finally {
            this.release(context)
        }
    }

    private open(): WriteContext {
        const context = createWriteContext()
        this.scope.store.set(context, this.override)
        this.scope.logger.debug?.('write concern override set', { context: context.id, override: this.override })
        return context
    }

    private release(context: WriteContext) {
        if (this.scope.store.clear(context)) {
            this.scope.logger.debug?.('write concern override cleared unused', { context: context.id })
        }
    }
}
