import type { MemcacheClient } from "../../adapters/memcache/memcache-client"

/** In-process stand-in for a memcached client. Records expirations, never expires. */
export class FakeMemcacheClient implements MemcacheClient {
  readonly store = new Map<string, { value: Buffer; expires: number }>()

  async get(key: string): Promise<{ value: Buffer | null }> {
    const entry = this.store.get(key)

    return { value: entry ? Buffer.from(entry.value) : null }
  }

  async getMulti(keys: string[]): Promise<Record<string, Buffer | undefined>> {
    const out: Record<string, Buffer | undefined> = {}

    for (const key of keys) {
      const entry = this.store.get(key)
      if (entry) out[key] = Buffer.from(entry.value)
    }

    return out
  }

  async set(key: string, value: Buffer, options: { expires: number }): Promise<boolean> {
    this.store.set(key, { value: Buffer.from(value), expires: options.expires })

    return true
  }

  async delete(key: string): Promise<boolean> {
    return this.store.delete(key)
  }

  async touch(key: string, expires: number): Promise<boolean> {
    const entry = this.store.get(key)
    if (!entry) return false

    entry.expires = expires

    return true
  }
}
