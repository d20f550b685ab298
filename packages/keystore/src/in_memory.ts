import { type KeyValueOptions, KeyValueStore } from './types.js'

export interface InMemoryOptions extends KeyValueOptions {
  cleanupEveryMs?: number // default 30s
  now?: () => number
}

type Entry = {
  value: string
  // epoch ms; undefined => persistent
  expiresAt?: number
}

export class InMemoryKeyValueStore extends KeyValueStore {
  private store = new Map<string, Entry>()
  private cleanupTimer?: ReturnType<typeof setInterval>
  private readonly now: () => number

  constructor(opts: InMemoryOptions = {}) {
    super(opts)
    this.now = opts.now ?? Date.now
    const timer = setInterval(() => this.gc(), opts.cleanupEveryMs ?? 30_000)
    // never keeps the process alive on its own
    timer.unref()
    this.cleanupTimer = timer
  }

  get size(): number {
    return this.store.size
  }

  protected async initialize(): Promise<void> {
    return
  }

  protected async _get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null
  }

  protected async _set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const expiresAt = ttlSeconds && ttlSeconds > 0 ? this.now() + ttlSeconds * 1000 : undefined
    this.store.set(key, { value, expiresAt })
  }

  protected async _del(key: string): Promise<number> {
    return this.store.delete(key) ? 1 : 0
  }

  protected async _exists(key: string): Promise<number> {
    return this.live(key) ? 1 : 0
  }

  protected async _keys(pattern: string): Promise<string[]> {
    // simple "*" wildcard only
    const asRegex = new RegExp('^' + pattern.split('*').map(escapeRegExp).join('.*') + '$')
    const keys: string[] = []
    for (const k of [...this.store.keys()]) {
      if (this.live(k) && asRegex.test(k)) keys.push(k)
    }
    return keys
  }

  protected async _ttl(key: string): Promise<number | null> {
    const e = this.live(key)
    if (!e?.expiresAt) return null
    const rem = Math.ceil((e.expiresAt - this.now()) / 1000)
    return rem > 0 ? rem : null
  }

  async close(): Promise<void> {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer)
      this.cleanupTimer = undefined
    }
    this.store.clear()
  }

  private live(key: string): Entry | undefined {
    const e = this.store.get(key)
    if (e && this.isExpired(e)) {
      this.store.delete(key)
      return undefined
    }
    return e
  }

  private isExpired(e: Entry): boolean {
    return e.expiresAt !== undefined && e.expiresAt <= this.now()
  }

  private gc(): void {
    for (const [k, e] of this.store.entries()) {
      if (this.isExpired(e)) this.store.delete(k)
    }
  }
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}
