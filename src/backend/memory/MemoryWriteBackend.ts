import { freeze, produce } from 'immer'
import { createCodedError, createNoopLogger, type Logger } from '#shared'
import { isAcknowledged } from '#writeConcern'
import type { Entity, WriteBackend, WriteRecord, WriteRequest, WriteResult } from '../types'

type ResourceStore<T> = Map<string, T>

// Stored values are deep copies, so freezing them never reaches the caller's objects.
function toStored<T>(item: T): T {
    return freeze(structuredClone(item), true)
}

type Applied = {
    ids: string[]
    matched: number
}

export class MemoryWriteBackend<T extends Entity> implements WriteBackend<T> {
    readonly key: string
    readonly writes: WriteRecord[] = []
    private readonly storesByResource = new Map<string, ResourceStore<T>>()
    private readonly logger: Logger

    constructor(config: {
        key: string
        seed?: Readonly<Record<string, T[]>>
        logger?: Logger
    }) {
        this.key = config.key
        this.logger = config.logger ?? createNoopLogger()
        if (config.seed) {
            Object.entries(config.seed).forEach(([resource, items]) => {
                const store = this.requireStore(resource)
                items.forEach(item => {
                    store.set(item.id, toStored(item))
                })
            })
        }
    }

    async write(request: WriteRequest<T>): Promise<WriteResult> {
        const acknowledged = isAcknowledged(request.writeConcern)
        const applied = this.apply(request, acknowledged)

        this.writes.push({
            resource: request.resource,
            action: request.action,
            ids: applied.ids,
            writeConcern: request.writeConcern
        })

        return acknowledged
            ? { acknowledged, writeConcern: request.writeConcern, matched: applied.matched }
            : { acknowledged, writeConcern: request.writeConcern }
    }

    async get(resource: string, id: string): Promise<T | undefined> {
        return this.storesByResource.get(resource)?.get(id)
    }

    async getAll(resource: string): Promise<T[]> {
        const store = this.storesByResource.get(resource)
        return store ? Array.from(store.values()) : []
    }

    private apply(request: WriteRequest<T>, acknowledged: boolean): Applied {
        const store = this.requireStore(request.resource)

        switch (request.action) {
            case 'create': {
                const duplicates = request.items.filter(item => store.has(item.id)).map(item => item.id)
                if (duplicates.length && acknowledged) {
                    throw createCodedError({
                        code: 'DUPLICATE_KEY',
                        message: `[memory] duplicate id in ${request.resource}: ${duplicates.join(', ')}`,
                        details: { resource: request.resource, ids: duplicates }
                    })
                }
                if (duplicates.length) {
                    this.logger.warn?.('unacknowledged create skipped duplicate ids', {
                        resource: request.resource,
                        ids: duplicates
                    })
                }
                const ids: string[] = []
                request.items.forEach(item => {
                    if (store.has(item.id)) return
                    store.set(item.id, toStored(item))
                    ids.push(item.id)
                })
                return { ids, matched: ids.length }
            }
            case 'upsert': {
                request.items.forEach(item => {
                    store.set(item.id, toStored(item))
                })
                const ids = request.items.map(item => item.id)
                return { ids, matched: ids.length }
            }
            case 'update': {
                const ids: string[] = []
                request.items.forEach(item => {
                    const current = store.get(item.id)
                    if (current === undefined) return
                    store.set(item.id, produce(current, draft => {
                        Object.assign(draft, item.changes)
                    }))
                    ids.push(item.id)
                })
                return { ids, matched: ids.length }
            }
            case 'delete': {
                const ids = request.items.filter(id => store.delete(id))
                return { ids, matched: ids.length }
            }
            case 'deleteAll': {
                const ids = Array.from(store.keys())
                store.clear()
                return { ids, matched: ids.length }
            }
        }
    }

    private requireStore(resource: string): ResourceStore<T> {
        const existing = this.storesByResource.get(resource)
        if (existing) return existing
        const created: ResourceStore<T> = new Map()
        this.storesByResource.set(resource, created)
        return created
    }
}
