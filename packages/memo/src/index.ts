export { MemcacheStorage } from "./adapters/memcache/memcache-storage"
export type { MemcacheClient } from "./adapters/memcache/memcache-client"
export { MAX_MEMCACHE_KEY_BYTES, toMemcacheKey } from "./adapters/memcache/memcache-key"
export {
  createMemoryStorage,
  type CreateMemoryStorageOptions,
  MemoryStorage,
  type MemoryStorageDeps,
  type MemoryStorageOptions,
} from "./adapters/memory/memory-storage"
export {
  createRedisBytesClient,
  type RedisBytesClient,
  type RedisBytesMulti,
  type RedisConnection,
  type RedisTtl,
} from "./adapters/redis/redis-client"
export { RedisStorage, type RedisStorageOptions } from "./adapters/redis/redis-storage"
export { Config } from "./config/config"
export { type LoadConfigOptions, loadConfig } from "./config/load-config"
export {
  loadMemoConfig,
  loggerOptionsFromConfig,
  type MemoConfig,
  memoConfigSchema,
  type RingDefaults,
  redisOptionsFromConfig,
  ringDefaultsFromConfig,
} from "./config/memo-config"
export { DEFAULT_ENV_PREFIX, EnvSource, type EnvSourceOptions } from "./config/sources/env-source"
export { ObjectSource } from "./config/sources/object-source"
export { bind } from "./core/bind/bind"
export type { AsyncBindOptions, BindOptions, SyncBindOptions } from "./core/bind/bind-options"
export { createBytesCodec } from "./core/codec/bytes-codec"
export { createJsonCodec } from "./core/codec/json-codec"
export { createStringCodec } from "./core/codec/string-codec"
export {
  ConfigValidationError,
  DecodingError,
  EncodingError,
  FlavorMismatchError,
  InvalidArgumentsError,
  InvalidOperationError,
  NotFoundError,
  NotImplementedError,
} from "./core/errors"
export { MemorySingleflight } from "./core/flight/memory-single-flight"
export { KeyBuilder, type KeyBuilderOptions } from "./core/key/key-builder"
export { escapePart, renderPart } from "./core/key/key-part"
export { isPositional, Signature, type SignatureOptions } from "./core/key/signature"
export { LiftedStorage, liftStorage } from "./core/storage/lift-storage"
export { type Clock, SystemClock } from "./core/time/clock"
export type { ArgsLike, CanonicalArgs, KeywordArgs } from "./ports/arguments"
export type { Binding, Capability } from "./ports/binding"
export type { CacheKey } from "./ports/cache-key"
export type { CacheTtl, Expire } from "./ports/cache-ttl"
export type { Codec } from "./ports/codec"
export type { ConfigSource } from "./ports/config-source"
export type { Effect, Flavor } from "./ports/flavor"
export type { KeyspacePrefix } from "./ports/keyspace-prefix"
export type { BulkRing, BulkRingVerbs, Ring, RingVerbs } from "./ports/ring"
export type { FlightResult, FlightSource, Singleflight } from "./ports/single-flight"
export {
  type AnyStorageAdapter,
  type AsyncStorageAdapter,
  NOT_FOUND,
  type NotFound,
  type StorageAdapter,
  type SyncStorageAdapter,
} from "./ports/storage-adapter"
export type { Milliseconds, Seconds } from "./ports/time"
