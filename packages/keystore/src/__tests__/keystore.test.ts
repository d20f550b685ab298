import { afterEach, describe, expect, it } from 'vitest'
import { InMemoryKeyValueStore } from '../in_memory.js'
import { ResultCache } from '../result_cache.js'

let clock = 1_000_000
const now = () => clock
const stores: InMemoryKeyValueStore[] = []

function makeStore(namespace?: string): InMemoryKeyValueStore {
  const store = new InMemoryKeyValueStore({ namespace, now })
  stores.push(store)
  return store
}

afterEach(async () => {
  for (const store of stores.splice(0)) await store.close()
  clock = 1_000_000
})

describe('InMemoryKeyValueStore', () => {
  it('round-trips JSON values under a namespace', async () => {
    const store = makeStore('ns')
    await store.set('a', { depth: [1, 2], ok: true })
    await store.set('b', 'text')

    expect(await store.get('a')).toEqual({ depth: [1, 2], ok: true })
    expect(await store.keys()).toEqual(['a', 'b'])
    expect(await store.keys('a*')).toEqual(['a'])
    expect(await store.del('a')).toBe(true)
    expect(await store.exists('a')).toBe(false)
  })

  it('expires entries after their ttl', async () => {
    const store = makeStore()
    await store.set('k', 1, 10)
    await store.set('forever', 2)

    clock += 4_000
    expect(await store.ttl('k')).toBe(6)
    expect(await store.ttl('forever')).toBeNull()

    clock += 6_000
    expect(await store.get('k')).toBeNull()
    expect(await store.exists('k')).toBe(false)
    expect(await store.get('forever')).toBe(2)
  })

  it('clears only its own namespace', async () => {
    const store = makeStore('one')
    await store.set('x', 1)
    await store.set('y', 2)
    expect(await store.clear()).toBe(2)
    expect(store.size).toBe(0)
  })
})

describe('ResultCache', () => {
  it('keys on operation and parameters regardless of key order', () => {
    expect(ResultCache.keyFor('op', { a: 1, b: 2 })).toBe(ResultCache.keyFor('op', { b: 2, a: 1 }))
    expect(ResultCache.keyFor('op', { a: 1 })).not.toBe(ResultCache.keyFor('other', { a: 1 }))
    expect(ResultCache.keyFor('op', {})).toMatch(/^[0-9a-f]{64}$/)
  })

  it('computes once and serves the stored value until it expires', async () => {
    const cache = new ResultCache(makeStore(), { ttlSeconds: 60 })
    let calls = 0
    const compute = () => {
      calls += 1
      return { count: calls }
    }

    expect(await cache.remember('count', { q: 1 }, compute)).toEqual({ count: 1 })
    expect(await cache.remember('count', { q: 1 }, compute)).toEqual({ count: 1 })
    expect(cache.stats()).toEqual({ hits: 1, misses: 1 })

    clock += 60_000
    expect(await cache.remember('count', { q: 1 }, compute)).toEqual({ count: 2 })
  })

  it('does not store values the caller rejects', async () => {
    const cache = new ResultCache(makeStore())
    const failed = { success: false }
    await cache.remember('op', {}, () => failed, (v) => v.success)
    expect(await cache.get('op', {})).toBeNull()
  })
})
