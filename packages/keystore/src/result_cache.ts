import { createHash } from 'crypto'
import { type Logger, makeLogger } from '@terrakit/logger'
import { TERRAIN_CONSTANTS, stableStringify } from '@terrakit/utils'
import type { KeyValueStore } from './types.js'

export interface ResultCacheOptions {
  ttlSeconds?: number
  logger?: Logger
}

export interface CacheStats {
  hits: number
  misses: number
}

/**
 * Memoises operation results in a KeyValueStore under
 * sha256("<operation>:<stable JSON of params>"), expiring after a TTL.
 */
export class ResultCache {
  private readonly ttlSeconds: number
  private readonly logger: Logger
  private hits = 0
  private misses = 0

  constructor(
    private readonly store: KeyValueStore,
    opts: ResultCacheOptions = {},
  ) {
    this.ttlSeconds = opts.ttlSeconds ?? TERRAIN_CONSTANTS.DEFAULT_CACHE_TTL_SECONDS
    this.logger = opts.logger ?? makeLogger('ResultCache')
  }

  static keyFor(operation: string, params: unknown): string {
    return createHash('sha256')
      .update(`${operation}:${stableStringify(params)}`)
      .digest('hex')
  }

  async get<T>(operation: string, params: unknown): Promise<T | null> {
    return this.store.get<T>(ResultCache.keyFor(operation, params))
  }

  async set(operation: string, params: unknown, value: unknown): Promise<void> {
    await this.store.set(ResultCache.keyFor(operation, params), value, this.ttlSeconds)
  }

  /** Cached value when present; otherwise computes, stores when `keep` allows, and returns. */
  async remember<T>(
    operation: string,
    params: unknown,
    compute: () => T | Promise<T>,
    keep: (value: T) => boolean = () => true,
  ): Promise<T> {
    const cached = await this.get<T>(operation, params)
    if (cached !== null) {
      this.hits += 1
      this.logger.trace('cache hit', { operation })
      return cached
    }
    this.misses += 1
    const value = await compute()
    if (keep(value)) await this.set(operation, params, value)
    return value
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses }
  }

  async clear(): Promise<number> {
    this.hits = 0
    this.misses = 0
    return this.store.clear()
  }

  async close(): Promise<void> {
    await this.store.close()
  }
}
