import { createClient, RESP_TYPES } from "redis"

export type RedisTtl = { EX: number } | { PX: number } | { PXAT: number }

export type RedisBytesMulti = {
  exists(key: string): unknown
  set(key: string, value: Uint8Array | Buffer, opts?: RedisTtl): unknown
  expire(key: string, seconds: number): unknown
  pExpire(key: string, milliseconds: number): unknown
  pExpireAt(key: string, timestamp: number): unknown
  exec(): Promise<unknown>
}

/**
 * The node-redis commands the storage adapter uses, with bulk strings mapped
 * to `Buffer`.
 */
export type RedisBytesClient = {
  get(key: string): Promise<Buffer | null>
  mGet(keys: string[]): Promise<(Buffer | null)[]>

  set(key: string, value: Uint8Array | Buffer, opts?: RedisTtl): Promise<unknown>

  del(keys: string | string[]): Promise<number>
  exists(keys: string | string[]): Promise<number>

  expire(key: string, seconds: number): Promise<unknown>
  pExpire(key: string, milliseconds: number): Promise<unknown>
  pExpireAt(key: string, timestamp: number): Promise<unknown>

  multi(): RedisBytesMulti
}

export type RedisConnection = {
  connect(): Promise<unknown>
  quit(): Promise<unknown>
  readonly isOpen: boolean
}

export function createRedisBytesClient(url: string): RedisBytesClient & RedisConnection {
  return createClient({ url }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient & RedisConnection
}
