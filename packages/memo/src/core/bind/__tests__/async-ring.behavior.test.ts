import { createMemoryStorage, MemoryStorage } from "../../../adapters/memory/memory-storage"
import type { AsyncStorageAdapter } from "../../../ports/storage-adapter"
import { Deferred } from "../../../tests/utils/deferred"
import { ManualTestClock } from "../../../tests/utils/manual-test-clock"
import { RecordingLogger } from "../../../tests/utils/recording-logger"
import { DecodingError } from "../../errors"
import { bind } from "../bind"

type User = { id: number; name: string }

const createCompute = () => vi.fn(async (id: number): Promise<User> => ({ id, name: `user-${id}` }))

/** Lets every pending storage and computation step run. */
const settle = () => new Promise<void>((resolve) => setImmediate(resolve))

describe("async ring", () => {
  let clock: ManualTestClock
  let storage: AsyncStorageAdapter
  let compute: ReturnType<typeof createCompute>

  beforeEach(() => {
    clock = new ManualTestClock()
    storage = createMemoryStorage({ flavor: "async", clock })
    compute = createCompute()
  })

  function ring() {
    return bind({ flavor: "async", fn: compute, storage, keyPrefix: "users" })
  }

  describe("getOrUpdate", () => {
    it("computes once and then serves the stored value", async () => {
      const users = ring()

      await expect(users(1)).resolves.toEqual({ id: 1, name: "user-1" })
      await expect(users(1)).resolves.toEqual({ id: 1, name: "user-1" })
      expect(compute).toHaveBeenCalledTimes(1)
    })

    it("writes only after the computation resolves", async () => {
      const gate = new Deferred<User>()
      const write = vi.spyOn(storage, "setValue")
      const users = bind({ flavor: "async", fn: (_id: number) => gate.promise, storage, keyPrefix: "users" })

      const pending = users(1)
      await settle()
      expect(write).not.toHaveBeenCalled()

      gate.resolve({ id: 1, name: "late" })
      await expect(pending).resolves.toEqual({ id: 1, name: "late" })
      expect(write).toHaveBeenCalledTimes(1)
    })

    it("writes nothing when the computation rejects", async () => {
      const write = vi.spyOn(storage, "setValue")
      const users = bind({
        flavor: "async",
        fn: async (_id: number): Promise<User> => {
          throw new Error("upstream down")
        },
        storage,
        keyPrefix: "users",
      })

      await expect(users(1)).rejects.toThrow("upstream down")
      expect(write).not.toHaveBeenCalled()
      await expect(users.has(1)).resolves.toBe(false)
    })

    it("lets concurrent misses each compute without singleflight", async () => {
      const gate = new Deferred<User>()
      const fn = vi.fn((_id: number) => gate.promise)
      const users = bind({ flavor: "async", fn, storage, keyPrefix: "users" })

      const first = users(1)
      const second = users(1)
      await settle()
      gate.resolve({ id: 1, name: "user-1" })

      await expect(Promise.all([first, second])).resolves.toEqual([
        { id: 1, name: "user-1" },
        { id: 1, name: "user-1" },
      ])
      expect(fn).toHaveBeenCalledTimes(2)
    })

    it("shares one computation between concurrent misses with singleflight", async () => {
      const gate = new Deferred<User>()
      const fn = vi.fn((_id: number) => gate.promise)
      const write = vi.spyOn(storage, "setValue")
      const users = bind({ flavor: "async", fn, storage, keyPrefix: "users", singleflight: true })

      const first = users(1)
      const second = users(1)
      const other = users(2)
      await settle()
      gate.resolve({ id: 1, name: "shared" })

      await Promise.all([first, second, other])
      expect(fn).toHaveBeenCalledTimes(2)
      expect(write).toHaveBeenCalledTimes(2)
      await expect(first).resolves.toEqual({ id: 1, name: "shared" })
      await expect(second).resolves.toEqual({ id: 1, name: "shared" })
    })

    it("logs followers of a shared computation as not computing", async () => {
      const logger = new RecordingLogger()
      const gate = new Deferred<User>()
      const users = bind({
        flavor: "async",
        fn: (_id: number) => gate.promise,
        storage,
        keyPrefix: "users",
        singleflight: true,
        logger,
      })

      const first = users(1)
      const second = users(1)
      await settle()
      gate.resolve({ id: 1, name: "shared" })
      await Promise.all([first, second])

      expect(logger.lines.map((line) => line.meta)).toEqual([
        { op: "getOrUpdate", key: "users:1", computed: 1 },
        { op: "getOrUpdate", key: "users:1", computed: 0 },
      ])
    })

    it("propagates adapter rejections", async () => {
      vi.spyOn(storage, "getValue").mockRejectedValue(new Error("backend unavailable"))

      await expect(ring()(1)).rejects.toThrow("backend unavailable")
      expect(compute).not.toHaveBeenCalled()
    })
  })

  describe("get", () => {
    it("returns the missValue for a miss without computing", async () => {
      const users = bind({ flavor: "async", fn: compute, storage, keyPrefix: "users", missValue: null })

      await expect(users.get(1)).resolves.toBeNull()
      expect(compute).not.toHaveBeenCalled()
    })

    it("rejects with DecodingError for undecodable bytes", async () => {
      await storage.setValue("users:1", new Uint8Array([0x7b]), null)

      await expect(ring().get(1)).rejects.toBeInstanceOf(DecodingError)
    })
  })

  describe("update / execute", () => {
    it("recomputes and overwrites on update", async () => {
      const users = ring()
      await users.set({ id: 1, name: "stale" }, 1)

      await expect(users.update(1)).resolves.toEqual({ id: 1, name: "user-1" })
      await expect(users.get(1)).resolves.toEqual({ id: 1, name: "user-1" })
    })

    it("executes without touching storage", async () => {
      const read = vi.spyOn(storage, "getValue")

      await expect(ring().execute(3)).resolves.toEqual({ id: 3, name: "user-3" })
      expect(read).not.toHaveBeenCalled()
      await expect(ring().has(3)).resolves.toBe(false)
    })
  })

  describe("set / delete / has / touch", () => {
    it("round-trips through storage", async () => {
      const users = ring()

      await users.set({ id: 5, name: "manual" }, 5)
      await expect(users.has(5)).resolves.toBe(true)
      await expect(users(5)).resolves.toEqual({ id: 5, name: "manual" })

      await users.delete(5)
      await expect(users.has(5)).resolves.toBe(false)
      expect(compute).not.toHaveBeenCalled()
    })

    it("extends the expiry on touch", async () => {
      const users = bind({
        flavor: "async",
        fn: compute,
        storage,
        keyPrefix: "users",
        expire: { kind: "milliseconds", milliseconds: 1_000 },
      })
      await users(1)

      clock.advance(900)
      await users.touch(1)
      clock.advance(900)

      await expect(users.has(1)).resolves.toBe(true)

      clock.advance(200)
      await expect(users.has(1)).resolves.toBe(false)
    })
  })

  describe("forced over a sync adapter", () => {
    it("stores into the sync adapter", async () => {
      const memory = new MemoryStorage({ clock })
      const users = bind({
        flavor: "async",
        fn: compute,
        storage: memory,
        keyPrefix: "users",
        forceFlavor: true,
      })

      await users(2)

      expect(memory.hasValue("users:2")).toBe(true)
      await expect(users(2)).resolves.toEqual({ id: 2, name: "user-2" })
      expect(compute).toHaveBeenCalledTimes(1)
    })
  })
})
