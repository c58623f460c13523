import type { Entity, UpdateItem } from '#backend'
import type { SafetyProxy, WriteConcernSpec } from '#writeConcern'
import type { Collection } from './Collection'
import type { WriteCallOptions, WriteOutcome } from './types'

/** Instance-level view of one entity; writes go through its collection. */
export class EntityHandle<T extends Entity> {
    constructor(
        readonly collection: Collection<T>,
        readonly value: T
    ) { }

    get id(): string {
        return this.value.id
    }

    safely(spec?: WriteConcernSpec): SafetyProxy<EntityHandle<T>> {
        return this.collection.runtime.safely(this, spec)
    }

    unsafely(): SafetyProxy<EntityHandle<T>> {
        return this.collection.runtime.unsafely(this)
    }

    save(options?: WriteCallOptions): Promise<WriteOutcome> {
        return this.collection.upsert(this.value, options)
    }

    update(changes: UpdateItem<T>['changes'], options?: WriteCallOptions): Promise<WriteOutcome> {
        return this.collection.update(this.id, changes, options)
    }

    destroy(options?: WriteCallOptions): Promise<WriteOutcome> {
        return this.collection.delete(this.id, options)
    }
}
