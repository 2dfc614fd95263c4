/**
 * Small in-memory cache with a TTL and a size cap. When full, the oldest
 * insertion is evicted. Each server instance gets its own copy.
 */

export interface TtlCache<V> {
  get(key: string): V | undefined
  set(key: string, value: V): void
  delete(key: string): void
  clear(): void
  readonly size: number
}

export function createTtlCache<V>(opts: {
  ttlMs: number
  maxEntries: number
  now?: () => number
}): TtlCache<V> {
  const now = opts.now ?? (() => Date.now())
  const entries = new Map<string, { value: V; expiresAt: number }>()

  return {
    get(key) {
      const hit = entries.get(key)
      if (!hit) return undefined
      if (hit.expiresAt <= now()) {
        entries.delete(key)
        return undefined
      }
      return hit.value
    },
    set(key, value) {
      entries.delete(key)
      while (entries.size >= opts.maxEntries) {
        const oldest = entries.keys().next()
        if (oldest.done) break
        entries.delete(oldest.value)
      }
      entries.set(key, { value, expiresAt: now() + opts.ttlMs })
    },
    delete(key) {
      entries.delete(key)
    },
    clear() {
      entries.clear()
    },
    get size() {
      return entries.size
    },
  }
}
