export type JsonValue = string | number | boolean | null | JsonValue[] | { [k: string]: JsonValue }

export interface KeyValueOptions {
  namespace?: string // optional key prefix
  defaultTTL?: number // seconds; applies when per-call ttl not provided
}

/**
 * Abstract KV store.
 * Implementations store values as JSON strings and honor TTL when provided.
 */
export abstract class KeyValueStore {
  protected readonly namespace: string
  protected readonly defaultTTL?: number

  private initialized = false
  private initPromise: Promise<void> | null = null

  constructor(opts: KeyValueOptions = {}) {
    this.namespace = (opts.namespace ?? '').trim()
    this.defaultTTL = opts.defaultTTL
  }

  async init(): Promise<void> {
    if (this.initialized) return

    if (!this.initPromise) {
      this.initPromise = (async () => {
        await this.initialize()
        this.initialized = true
      })()
    }

    return this.initPromise
  }

  private async ensureInitialized(): Promise<void> {
    if (!this.initialized) {
      await this.init()
    }
  }

  async get<T = JsonValue>(key: string): Promise<T | null> {
    await this.ensureInitialized()
    const raw = await this._get(this.n(key))
    return raw == null ? null : this.deserialize<T>(raw)
  }

  async set<T = JsonValue>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    await this.ensureInitialized()
    const ttl = ttlSeconds ?? this.defaultTTL
    await this._set(this.n(key), this.serialize(value), ttl)
  }

  async del(key: string): Promise<boolean> {
    await this.ensureInitialized()
    return (await this._del(this.n(key))) > 0
  }

  async exists(key: string): Promise<boolean> {
    await this.ensureInitialized()
    return (await this._exists(this.n(key))) > 0
  }

  /** keys("*") returns all live keys in this namespace, without the prefix. */
  async keys(pattern = '*'): Promise<string[]> {
    await this.ensureInitialized()
    const full = await this._keys(this.n(pattern))
    const prefix = this.nsPrefix()
    return full.filter((k) => k.startsWith(prefix)).map((k) => k.slice(prefix.length))
  }

  /** Remaining seconds, or null for a missing or persistent key. */
  async ttl(key: string): Promise<number | null> {
    await this.ensureInitialized()
    const t = await this._ttl(this.n(key))
    if (t == null || t < 0) return null
    return t
  }

  /** Drops every key in this namespace; returns how many went. */
  async clear(): Promise<number> {
    const keys = await this.keys('*')
    let removed = 0
    for (const key of keys) removed += await this._del(this.n(key))
    return removed
  }

  abstract close(): Promise<void>

  protected abstract initialize(): Promise<void>
  protected abstract _get(key: string): Promise<string | null>
  protected abstract _set(key: string, value: string, ttlSeconds?: number): Promise<void>
  protected abstract _del(key: string): Promise<number>
  protected abstract _exists(key: string): Promise<number>
  protected abstract _keys(pattern: string): Promise<string[]>
  protected abstract _ttl(key: string): Promise<number | null>

  protected nsPrefix(): string {
    return this.namespace ? `${this.namespace}:` : ''
  }

  protected n(key: string): string {
    return `${this.nsPrefix()}${key}`
  }

  protected serialize(value: unknown): string {
    return JSON.stringify(value)
  }

  protected deserialize<T>(raw: string): T {
    return JSON.parse(raw) as T
  }
}
