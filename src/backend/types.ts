import type { WriteConcernOptions } from '#writeConcern'

export type Entity = {
    id: string
}

export type WriteAction = 'create' | 'upsert' | 'update' | 'delete' | 'deleteAll'

export type UpdateItem<T extends Entity> = {
    id: string
    changes: Partial<Omit<T, 'id'>>
}

type WriteRequestBase = {
    resource: string
    writeConcern: WriteConcernOptions
}

export type WriteRequest<T extends Entity> = WriteRequestBase & (
    | { action: 'create' | 'upsert'; items: T[] }
    | { action: 'update'; items: Array<UpdateItem<T>> }
    | { action: 'delete'; items: string[] }
    | { action: 'deleteAll' }
)

/** `matched` is only reported for acknowledged writes. */
export type WriteResult = {
    acknowledged: boolean
    writeConcern: WriteConcernOptions
    matched?: number
}

export type WriteRecord = Readonly<{
    resource: string
    action: WriteAction
    ids: string[]
    writeConcern: WriteConcernOptions
}>

export interface WriteBackend<T extends Entity> {
    readonly key: string
    write(request: WriteRequest<T>): Promise<WriteResult>
    get(resource: string, id: string): Promise<T | undefined>
    getAll(resource: string): Promise<T[]>
}
