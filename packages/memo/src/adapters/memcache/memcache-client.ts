/**
 * The memcached commands `MemcacheStorage` needs. Callers wrap the client
 * library of their choice to fit it; `getMulti` must resolve one entry per
 * found key.
 *
 * Expirations are seconds relative to now, or an absolute unix time in
 * seconds when larger than 30 days. `0` never expires.
 */
export type MemcacheClient = {
  get(key: string): Promise<{ value: Buffer | null }>
  getMulti(keys: string[]): Promise<Record<string, Buffer | undefined>>
  set(key: string, value: Buffer, options: { expires: number }): Promise<boolean>
  delete(key: string): Promise<boolean>
  touch(key: string, expires: number): Promise<boolean>
}
