import { describe, expect, it } from 'vitest'
import { createMemoryBackend } from '../../src/backend'
import { isCodedError } from '../../src/shared'
import { createCollection } from '../../src/store'
import { WriteConcernRuntime } from '../../src/writeConcern'
import type { WriteConcernConfigInput } from '../../src/writeConcern'

type Post = {
    id: string
    title: string
}

function setup(config?: WriteConcernConfigInput, seed?: Post[]) {
    const backend = createMemoryBackend<Post>(seed ? { seed: { posts: seed } } : undefined)
    const runtime = new WriteConcernRuntime({ config })
    const posts = createCollection<Post>({ name: 'posts', backend, runtime })
    return { backend, runtime, posts }
}

describe('collection writes resolve their write concern', () => {
    it('默认配置下写入不等待确认', async () => {
        const { backend, posts } = setup()
        const outcome = await posts.create({ id: 'p1', title: 'hello' })
        expect(outcome).toEqual({ acknowledged: false, writeConcern: { w: 0 } })
        expect(backend.writes).toEqual([
            { resource: 'posts', action: 'create', ids: ['p1'], writeConcern: { w: 0 } }
        ])
    })

    it('persistInSafeMode=true 时默认 w=1', async () => {
        const { posts } = setup({ persistInSafeMode: true })
        expect(await posts.create({ id: 'p1', title: 'hello' })).toEqual({
            acknowledged: true,
            writeConcern: { w: 1 },
            matched: 1
        })
    })

    it('集合级 safely(options) 作用于下一次写入', async () => {
        const { posts } = setup(undefined, [{ id: 'p1', title: 'a' }, { id: 'p2', title: 'b' }])
        const outcome = await posts.safely({ w: 2, fsync: true }).runAsync((collection, context) =>
            collection.deleteAll({ context })
        )
        expect(outcome).toEqual({ acknowledged: true, writeConcern: { w: 2, fsync: true }, matched: 2 })
        expect(await posts.getAll()).toEqual([])
    })

    it('实例级 safely() 以 w=1 更新', async () => {
        const { posts } = setup(undefined, [{ id: 'p1', title: 'a' }])
        const handle = await posts.get('p1')
        if (!handle) throw new Error('missing p1')

        const outcome = await handle.safely().runAsync((entity, context) => entity.update({ title: 'b' }, { context }))
        expect(outcome).toEqual({ acknowledged: true, writeConcern: { w: 1 }, matched: 1 })

        const updated = await posts.get('p1')
        expect(updated?.value).toEqual({ id: 'p1', title: 'b' })
    })

    it('unsafely 覆盖安全默认', async () => {
        const { posts } = setup({ defaultWriteConcern: { w: 2 }, persistInSafeMode: true })
        const outcome = await posts.unsafely().runAsync((collection, context) =>
            collection.upsert({ id: 'p1', title: 'x' }, { context })
        )
        expect(outcome).toEqual({ acknowledged: false, writeConcern: { w: 0 } })
        expect((await posts.get('p1'))?.value).toEqual({ id: 'p1', title: 'x' })
    })

    it('显式 writeConcern 优先于 override', async () => {
        const { runtime, posts } = setup()
        const outcome = await posts.safely(3).runAsync((collection, context) =>
            collection.create({ id: 'p1', title: 'x' }, { context, writeConcern: { w: 'majority' } })
        )
        expect(outcome.writeConcern).toEqual({ w: 'majority' })
        expect(runtime.store.size).toBe(0)
    })

    it('override 只作用于下一次写入', async () => {
        const { posts } = setup()
        const concerns = await posts.safely(2).runAsync(async (collection, context) => {
            const first = await collection.create({ id: 'p1', title: 'a' }, { context })
            const second = await collection.create({ id: 'p2', title: 'b' }, { context })
            return [first.writeConcern, second.writeConcern]
        })
        expect(concerns).toEqual([{ w: 2 }, { w: 0 }])
    })

    it('全局默认作用于没有 override 的写入', async () => {
        const { backend, posts } = setup({ defaultWriteConcern: { w: 2, wtimeout: 100 } }, [{ id: 'p1', title: 'a' }])
        const handle = posts.entity({ id: 'p1', title: 'a' })
        expect(await handle.destroy()).toEqual({ acknowledged: true, writeConcern: { w: 2, wtimeout: 100 }, matched: 1 })
        expect(backend.writes[0]).toEqual({ resource: 'posts', action: 'delete', ids: ['p1'], writeConcern: { w: 2, wtimeout: 100 } })
    })

    it('save 以 upsert 写入', async () => {
        const { backend, posts } = setup({ persistInSafeMode: true })
        const handle = posts.entity({ id: 'p9', title: 'new' })
        expect(handle.id).toBe('p9')
        expect(await handle.save()).toEqual({ acknowledged: true, writeConcern: { w: 1 }, matched: 1 })
        expect(backend.writes[0]?.action).toBe('upsert')
    })

    it('确认写入时重复 id 抛出 DUPLICATE_KEY', async () => {
        const { posts } = setup({ persistInSafeMode: true }, [{ id: 'p1', title: 'a' }])
        let caught: unknown
        try {
            await posts.create({ id: 'p1', title: 'again' })
        } catch (error) {
            caught = error
        }
        expect(isCodedError(caught, 'DUPLICATE_KEY')).toBe(true)
        expect((await posts.get('p1'))?.value).toEqual({ id: 'p1', title: 'a' })
    })

    it('run 在第一个 await 之前解析，因此同步入口也能用于异步写入', async () => {
        const { posts } = setup()
        const pending = posts.safely(2).run((collection, context) => collection.create({ id: 'p1', title: 'a' }, { context }))
        expect(await pending).toEqual({ acknowledged: true, writeConcern: { w: 2 }, matched: 1 })
    })
})
