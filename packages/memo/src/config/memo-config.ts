import type { LoggerOptions } from "@halyard/logger"
import { logLevelNames } from "@halyard/logger"
import { z } from "zod"
import type { RedisStorageOptions } from "../adapters/redis/redis-storage"
import type { Expire } from "../ports/cache-ttl"
import type { ConfigSource } from "../ports/config-source"
import type { Config } from "./config"
import { loadConfig } from "./load-config"

export const memoConfigSchema = z.object({
  KEY_PREFIX: z.string().min(1).optional(),
  /** `0` stores entries without expiry. */
  EXPIRE_SECONDS: z.coerce.number().int().nonnegative().optional(),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
  REDIS_URL: z.url().optional(),
  REDIS_BATCH_SIZE: z.coerce.number().int().positive().default(1000),
  REDIS_KEYSPACE_PREFIX: z.string().default(""),
})

export type MemoConfig = z.infer<typeof memoConfigSchema>

export function loadMemoConfig(
  options: { sources?: readonly ConfigSource[] } = {},
): Promise<Config<MemoConfig>> {
  return loadConfig({ schema: memoConfigSchema, ...options })
}

export type RingDefaults = {
  keyPrefix?: string
  expire?: Expire
}

/**
 * Bind options shared by every ring of an application.
 *
 * @example
 * ```ts
 * const users = bind({ ...ringDefaultsFromConfig(config), flavor: "async", fn, storage })
 * ```
 */
export function ringDefaultsFromConfig(config: Config<MemoConfig>): RingDefaults {
  const { KEY_PREFIX, EXPIRE_SECONDS } = config.value
  const defaults: RingDefaults = {}

  if (KEY_PREFIX !== undefined) defaults.keyPrefix = KEY_PREFIX
  if (EXPIRE_SECONDS !== undefined) {
    defaults.expire =
      EXPIRE_SECONDS === 0 ? null : { kind: "seconds", seconds: EXPIRE_SECONDS }
  }

  return defaults
}

export function loggerOptionsFromConfig(config: Config<MemoConfig>): LoggerOptions {
  return { level: config.value.LOG_LEVEL, prettify: config.value.LOG_PRETTY }
}

export function redisOptionsFromConfig(config: Config<MemoConfig>): RedisStorageOptions {
  return {
    batchSize: config.value.REDIS_BATCH_SIZE,
    keyspacePrefix: config.value.REDIS_KEYSPACE_PREFIX,
  }
}
