import type { Entity, UpdateItem, WriteBackend } from '#backend'
import type { SafetyProxy, WriteConcernOptions, WriteConcernRuntime, WriteConcernSpec } from '#writeConcern'
import { EntityHandle } from './EntityHandle'
import type { WriteCallOptions, WriteOutcome } from './types'

export type CollectionConfig<T extends Entity> = Readonly<{
    name: string
    backend: WriteBackend<T>
    runtime: WriteConcernRuntime
}>

/**
 * Type-level persistence entry point.
 * Every write resolves its effective write concern synchronously, before the
 * first await, so an override set by `run` is always seen.
 */
export class Collection<T extends Entity> {
    readonly name: string
    readonly runtime: WriteConcernRuntime
    private readonly backend: WriteBackend<T>

    constructor(config: CollectionConfig<T>) {
        this.name = config.name
        this.backend = config.backend
        this.runtime = config.runtime
    }

    safely(spec?: WriteConcernSpec): SafetyProxy<Collection<T>> {
        return this.runtime.safely(this, spec)
    }

    unsafely(): SafetyProxy<Collection<T>> {
        return this.runtime.unsafely(this)
    }

    entity(value: T): EntityHandle<T> {
        return new EntityHandle(this, value)
    }

    async get(id: string): Promise<EntityHandle<T> | undefined> {
        const value = await this.backend.get(this.name, id)
        return value === undefined ? undefined : this.entity(value)
    }

    async getAll(): Promise<T[]> {
        return await this.backend.getAll(this.name)
    }

    async create(entity: T, options?: WriteCallOptions): Promise<WriteOutcome> {
        const writeConcern = this.resolveWriteConcern(options)
        return await this.backend.write({ resource: this.name, action: 'create', items: [entity], writeConcern })
    }

    async upsert(entity: T, options?: WriteCallOptions): Promise<WriteOutcome> {
        const writeConcern = this.resolveWriteConcern(options)
        return await this.backend.write({ resource: this.name, action: 'upsert', items: [entity], writeConcern })
    }

    async update(id: string, changes: UpdateItem<T>['changes'], options?: WriteCallOptions): Promise<WriteOutcome> {
        const writeConcern = this.resolveWriteConcern(options)
        return await this.backend.write({ resource: this.name, action: 'update', items: [{ id, changes }], writeConcern })
    }

    async delete(id: string, options?: WriteCallOptions): Promise<WriteOutcome> {
        const writeConcern = this.resolveWriteConcern(options)
        return await this.backend.write({ resource: this.name, action: 'delete', items: [id], writeConcern })
    }

    async deleteAll(options?: WriteCallOptions): Promise<WriteOutcome> {
        const writeConcern = this.resolveWriteConcern(options)
        return await this.backend.write({ resource: this.name, action: 'deleteAll', writeConcern })
    }

    private resolveWriteConcern(options: WriteCallOptions | undefined): WriteConcernOptions {
        return this.runtime.resolve(options?.context, options?.writeConcern)
    }
}

export function createCollection<T extends Entity>(config: CollectionConfig<T>): Collection<T> {
    return new Collection(config)
}
