import type { Logger } from "@halyard/logger"
import type { Expire } from "../../ports/cache-ttl"
import type { Singleflight } from "../../ports/single-flight"
import type { KeyBuilder } from "../key/key-builder"
import type { Signature } from "../key/signature"
import type { AsyncCodecStorage, SyncCodecStorage } from "../storage/codec-storage"

type CommonDeps<A extends unknown[], M> = {
  signature: Signature<A>
  keys: KeyBuilder<A>
  expire: Expire
  missValue: M
  logger: Logger
}

export type SyncInterfaceDeps<A extends unknown[], R, M> = CommonDeps<A, M> & {
  /** Ring name, for errors. */
  name: string
  fn: (...args: A) => R
  storage: SyncCodecStorage<R>
}

export type AsyncInterfaceDeps<A extends unknown[], R, M> = CommonDeps<A, M> & {
  fn: (...args: A) => R | Promise<R>
  storage: AsyncCodecStorage<R>
  /** Shares concurrent `getOrUpdate` misses per key when set. */
  flight?: Singleflight
}
