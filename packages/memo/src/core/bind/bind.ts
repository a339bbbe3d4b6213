import { createNullLogger, type Logger } from "@halyard/logger"
import type { Binding, Capability } from "../../ports/binding"
import type { Expire } from "../../ports/cache-ttl"
import type { Codec } from "../../ports/codec"
import type { BulkRing, BulkRingVerbs, Ring, RingVerbs } from "../../ports/ring"
import type { Flavor } from "../../ports/flavor"
import { createJsonCodec } from "../codec/json-codec"
import { InvalidArgumentsError } from "../errors"
import { MemorySingleflight } from "../flight/memory-single-flight"
import { AsyncBulkInterface } from "../interface/async-bulk-interface"
import { AsyncCacheInterface } from "../interface/async-cache-interface"
import type { AsyncInterfaceDeps, SyncInterfaceDeps } from "../interface/interface-deps"
import { SyncBulkInterface } from "../interface/sync-bulk-interface"
import { SyncCacheInterface } from "../interface/sync-cache-interface"
import { KeyBuilder } from "../key/key-builder"
import { Signature } from "../key/signature"
import { AsyncCodecStorage, SyncCodecStorage } from "../storage/codec-storage"
import type { AsyncBindOptions, BindOptions, SyncBindOptions } from "./bind-options"
import { resolveAsyncStorage, resolveSyncStorage } from "./resolve-storage"

/**
 * Wraps `fn` in a ring: a function with the same parameters that returns the
 * cached result when there is one and computes and stores it otherwise.
 *
 * @remarks
 * Flavors are checked here, once:
 * - a sync ring over an async adapter fails with `FlavorMismatchError`;
 * - an async ring over a sync adapter fails the same way unless
 *   `forceFlavor` is set.
 *
 * @example
 * ```ts
 * const user = bind({
 *   flavor: "async",
 *   fn: (id: number, lang: string) => fetchUser(id, lang),
 *   params: ["id", "lang"],
 *   storage: redisStorage,
 *   expire: { kind: "seconds", seconds: 60 },
 *   bulk: true,
 * })
 *
 * await user(1, "en")                                  // getOrUpdate
 * await user.getOrUpdateMany([[1, "en"], { id: 2, lang: "de" }])
 * await user.delete(1, "en")
 * ```
 */
export function bind<A extends unknown[], R, M = undefined>(
  options: SyncBindOptions<A, R, M> & { bulk: true },
): BulkRing<"sync", A, R, M>
export function bind<A extends unknown[], R, M = undefined>(
  options: SyncBindOptions<A, R, M> & { bulk?: false },
): Ring<"sync", A, R, M>
export function bind<A extends unknown[], R, M = undefined>(
  options: AsyncBindOptions<A, R, M> & { bulk: true },
): BulkRing<"async", A, R, M>
export function bind<A extends unknown[], R, M = undefined>(
  options: AsyncBindOptions<A, R, M> & { bulk?: false },
): Ring<"async", A, R, M>
export function bind<A extends unknown[], R, M>(
  options: BindOptions<A, R, M | undefined>,
):
  | Ring<"sync", A, R, M | undefined>
  | BulkRing<"sync", A, R, M | undefined>
  | Ring<"async", A, R, M | undefined>
  | BulkRing<"async", A, R, M | undefined> {
  const name = options.fn.name || "anonymous"
  const logger = (options.logger ?? createNullLogger()).child({
    ring: name,
    flavor: options.flavor,
    adapter: options.storage.name,
  })

  const signature = new Signature<A>({
    params: options.params,
    defaults: options.defaults,
    arity: options.fn.length,
  })

  for (const ignorable of options.ignorableKeys ?? []) {
    if (!signature.accepts(ignorable)) throw InvalidArgumentsError.unknownIgnorableKey(ignorable)
  }

  const keyPrefix = options.keyPrefix ?? name
  const keys = new KeyBuilder<A>({
    signature,
    prefix: keyPrefix,
    ignorableKeys: options.ignorableKeys,
    refactorKey: options.storage.refactorKey?.bind(options.storage),
  })

  const coder: Codec<R> = options.coder ?? createJsonCodec<R>()
  const expire = checkExpire(options.expire ?? null)
  const capabilities: Capability[] = options.bulk ? ["single", "bulk"] : ["single"]
  const common = { signature, keys, expire, missValue: options.missValue, logger }

  const bindingFor = <F extends Flavor>(flavor: F, forcedFlavor: boolean, singleflight: boolean) =>
    createBinding<F, R, M | undefined>({
      name,
      flavor,
      keyPrefix,
      expireDefault: expire,
      coder,
      storage: options.storage,
      missValue: options.missValue,
      capabilities,
      params: signature.namesOf(new Map()),
      ignorableKeys: options.ignorableKeys ?? [],
      forcedFlavor,
      singleflight,
    })

  if (options.flavor === "sync") {
    const storage = resolveSyncStorage(name, options.storage)
    const deps: SyncInterfaceDeps<A, R, M | undefined> = {
      ...common,
      name,
      fn: options.fn,
      storage: new SyncCodecStorage(storage, coder),
    }
    const binding = bindingFor("sync", false, false)

    return options.bulk
      ? syncBulkRing(new SyncBulkInterface(deps), binding)
      : syncRing(new SyncCacheInterface(deps), binding)
  }

  const resolved = resolveAsyncStorage(name, options.storage, {
    forceFlavor: options.forceFlavor ?? false,
    logger,
  })

  const singleflight = options.singleflight ?? false
  const deps: AsyncInterfaceDeps<A, R, M | undefined> = {
    ...common,
    fn: options.fn,
    storage: new AsyncCodecStorage(resolved.storage, coder),
    ...(singleflight && { flight: new MemorySingleflight() }),
  }
  const binding = bindingFor("async", resolved.forced, singleflight)

  return options.bulk
    ? asyncBulkRing(new AsyncBulkInterface(deps), binding)
    : asyncRing(new AsyncCacheInterface(deps), binding)
}

function createBinding<F extends Flavor, R, M>(fields: Binding<F, R, M>): Binding<F, R, M> {
  return Object.freeze({
    ...fields,
    capabilities: Object.freeze([...fields.capabilities]),
    params: Object.freeze([...fields.params]),
    ignorableKeys: Object.freeze([...fields.ignorableKeys]),
  })
}

function named<T extends (...args: never[]) => unknown>(fn: T, name: string): T {
  return Object.defineProperty(fn, "name", { value: name })
}

function syncVerbs<A extends unknown[], R, M>(
  ring: SyncCacheInterface<A, R, M>,
  binding: Binding<"sync", R, M>,
): RingVerbs<"sync", A, R, M> {
  return {
    binding,
    key: (...args) => ring.key(...args),
    execute: (...args) => ring.execute(...args),
    get: (...args) => ring.get(...args),
    update: (...args) => ring.update(...args),
    getOrUpdate: (...args) => ring.getOrUpdate(...args),
    set: (value, ...args) => ring.set(value, ...args),
    delete: (...args) => ring.delete(...args),
    has: (...args) => ring.has(...args),
    touch: (...args) => ring.touch(...args),
  }
}

function syncRing<A extends unknown[], R, M>(
  ring: SyncCacheInterface<A, R, M>,
  binding: Binding<"sync", R, M>,
): Ring<"sync", A, R, M> {
  const call = named((...args: A) => ring.getOrUpdate(...args), binding.name)

  return Object.assign(call, syncVerbs(ring, binding))
}

function syncBulkRing<A extends unknown[], R, M>(
  ring: SyncBulkInterface<A, R, M>,
  binding: Binding<"sync", R, M>,
): BulkRing<"sync", A, R, M> {
  const call = named((...args: A) => ring.getOrUpdate(...args), binding.name)
  const verbs: BulkRingVerbs<"sync", A, R, M> = {
    ...syncVerbs(ring, binding),
    keyMany: (argsList) => ring.keyMany(argsList),
    executeMany: (argsList) => ring.executeMany(argsList),
    getMany: (argsList) => ring.getMany(argsList),
    updateMany: (argsList) => ring.updateMany(argsList),
    getOrUpdateMany: (argsList) => ring.getOrUpdateMany(argsList),
    setMany: (argsList, values) => ring.setMany(argsList, values),
    deleteMany: (argsList) => ring.deleteMany(argsList),
    hasMany: (argsList) => ring.hasMany(argsList),
    touchMany: (argsList) => ring.touchMany(argsList),
  }

  return Object.assign(call, verbs)
}

function asyncVerbs<A extends unknown[], R, M>(
  ring: AsyncCacheInterface<A, R, M>,
  binding: Binding<"async", R, M>,
): RingVerbs<"async", A, R, M> {
  return {
    binding,
    key: (...args) => ring.key(...args),
    execute: (...args) => ring.execute(...args),
    get: (...args) => ring.get(...args),
    update: (...args) => ring.update(...args),
    getOrUpdate: (...args) => ring.getOrUpdate(...args),
    set: (value, ...args) => ring.set(value, ...args),
    delete: (...args) => ring.delete(...args),
    has: (...args) => ring.has(...args),
    touch: (...args) => ring.touch(...args),
  }
}

function asyncRing<A extends unknown[], R, M>(
  ring: AsyncCacheInterface<A, R, M>,
  binding: Binding<"async", R, M>,
): Ring<"async", A, R, M> {
  const call = named((...args: A) => ring.getOrUpdate(...args), binding.name)

  return Object.assign(call, asyncVerbs(ring, binding))
}

function asyncBulkRing<A extends unknown[], R, M>(
  ring: AsyncBulkInterface<A, R, M>,
  binding: Binding<"async", R, M>,
): BulkRing<"async", A, R, M> {
  const call = named((...args: A) => ring.getOrUpdate(...args), binding.name)
  const verbs: BulkRingVerbs<"async", A, R, M> = {
    ...asyncVerbs(ring, binding),
    keyMany: (argsList) => ring.keyMany(argsList),
    executeMany: (argsList) => ring.executeMany(argsList),
    getMany: (argsList) => ring.getMany(argsList),
    updateMany: (argsList) => ring.updateMany(argsList),
    getOrUpdateMany: (argsList) => ring.getOrUpdateMany(argsList),
    setMany: (argsList, values) => ring.setMany(argsList, values),
    deleteMany: (argsList) => ring.deleteMany(argsList),
    hasMany: (argsList) => ring.hasMany(argsList),
    touchMany: (argsList) => ring.touchMany(argsList),
  }

  return Object.assign(call, verbs)
}

/** Durations are whole and positive; `null` is the only persistent expiry. */
function checkExpire(expire: Expire): Expire {
  if (expire === null) return null

  if (expire.kind === "until") {
    if (Number.isNaN(expire.expiresAt.getTime())) {
      throw InvalidArgumentsError.invalidExpire("until", "expiresAt is not a valid Date")
    }
    return expire
  }

  const amount = expire.kind === "seconds" ? expire.seconds : expire.milliseconds
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw InvalidArgumentsError.invalidExpire(
      expire.kind,
      `expected a positive integer, received ${amount}`,
    )
  }

  return expire
}
