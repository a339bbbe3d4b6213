import type { Logger } from "@halyard/logger"
import type {
  AnyStorageAdapter,
  AsyncStorageAdapter,
  SyncStorageAdapter,
} from "../../ports/storage-adapter"
import { FlavorMismatchError } from "../errors"
import { liftStorage } from "../storage/lift-storage"

/** A sync ring cannot wait for an async adapter. */
export function resolveSyncStorage(ring: string, storage: AnyStorageAdapter): SyncStorageAdapter {
  if (storage.flavor === "async") throw FlavorMismatchError.syncOverAsync(ring, storage.name)

  return storage
}

/**
 * An async ring runs over a sync adapter only when forced; the adapter is
 * then lifted and its calls run inline on the event loop.
 */
export function resolveAsyncStorage(
  ring: string,
  storage: AnyStorageAdapter,
  options: { forceFlavor: boolean; logger: Logger },
): { storage: AsyncStorageAdapter; forced: boolean } {
  if (storage.flavor === "async") return { storage, forced: false }

  if (!options.forceFlavor) throw FlavorMismatchError.asyncOverSync(ring, storage.name)

  options.logger.warn("async ring bound to a sync adapter; storage calls run inline", {
    adapter: storage.name,
  })

  return { storage: liftStorage(storage), forced: true }
}
