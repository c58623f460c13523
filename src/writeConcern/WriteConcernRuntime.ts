import { childLogger, createNoopLogger, type Logger } from '#shared'
import { defineWriteConcernConfig, type WriteConcernConfig, type WriteConcernConfigInput } from './config'
import { resolveWriteConcern } from './merge'
import { normalizeWriteConcernSpec, unsafeWriteConcern } from './normalize'
import { ContextOverrideStore } from './OverrideStore'
import { SafetyProxy } from './SafetyProxy'
import type { WriteConcernOptions, WriteConcernSpec, WriteContext } from './types'

export type WriteConcernRuntimeOptions = Readonly<{
    config?: WriteConcernConfig | WriteConcernConfigInput
    logger?: Logger
    store?: ContextOverrideStore
}>

/**
 * Runtime: owns the startup config and the override store.
 * - `safely`/`unsafely` build proxies for any receiver.
 * - Persistence operations call `resolve` right before talking to the backend.
 */
export class WriteConcernRuntime {
    readonly config: WriteConcernConfig
    readonly store: ContextOverrideStore
    private readonly logger: Logger

    constructor(options?: WriteConcernRuntimeOptions) {
        this.config = defineWriteConcernConfig(options?.config)
        this.store = options?.store ?? new ContextOverrideStore()
        this.logger = childLogger(options?.logger ?? createNoopLogger(), { scope: 'writeConcern' })
    }

    safely<R>(receiver: R, spec?: WriteConcernSpec): SafetyProxy<R> {
        return new SafetyProxy({ store: this.store, logger: this.logger }, receiver, normalizeWriteConcernSpec(spec))
    }

    unsafely<R>(receiver: R): SafetyProxy<R> {
        return new SafetyProxy({ store: this.store, logger: this.logger }, receiver, unsafeWriteConcern())
    }

    /** Effective options for one write; consumes the context's override. */
    resolve(context: WriteContext | undefined, explicit?: WriteConcernOptions | null): WriteConcernOptions {
        const override = this.store.take(context)
        const resolved = resolveWriteConcern(explicit, { override, config: this.config })
        this.logger.debug?.('write concern resolved', {
            context: context?.id,
            source: resolved.source,
            writeConcern: resolved.options
        })
        return resolved.options
    }

    preview(context: WriteContext | undefined, explicit?: WriteConcernOptions | null): WriteConcernOptions {
        return resolveWriteConcern(explicit, { override: this.store.get(context), config: this.config }).options
    }
}
