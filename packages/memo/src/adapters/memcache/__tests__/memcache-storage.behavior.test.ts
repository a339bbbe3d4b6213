import { NotFoundError, NotImplementedError } from "../../../core/errors"
import { NOT_FOUND } from "../../../ports/storage-adapter"
import { FakeMemcacheClient } from "../../../tests/utils/fake-memcache-client"
import { ManualTestClock } from "../../../tests/utils/manual-test-clock"
import { bytes, keys } from "../../../tests/utils/memo-test-helpers"
import { MemcacheStorage } from "../memcache-storage"

describe("MemcacheStorage (behavior)", () => {
  let client: FakeMemcacheClient
  let clock: ManualTestClock
  let storage: MemcacheStorage

  beforeEach(() => {
    client = new FakeMemcacheClient()
    clock = new ManualTestClock()
    storage = new MemcacheStorage(client, { clock })
  })

  describe("single-key verbs", () => {
    it("round-trips bytes", async () => {
      await storage.setValue(keys.one(), bytes.a(), null)

      await expect(storage.getValue(keys.one())).resolves.toStrictEqual(bytes.a())
    })

    it("rejects with NotFoundError for an absent key", async () => {
      await expect(storage.getValue(keys.one())).rejects.toBeInstanceOf(NotFoundError)
    })

    it("deletes", async () => {
      await storage.setValue(keys.one(), bytes.a(), null)
      await storage.deleteValue(keys.one())

      expect(client.store.has(keys.one())).toBe(false)
    })

    it("does not support hasValue", async () => {
      await expect(storage.hasValue(keys.one())).rejects.toBeInstanceOf(NotImplementedError)
    })
  })

  describe("expiry mapping", () => {
    it.each([
      ["persistent", null, 0],
      ["seconds", { kind: "seconds", seconds: 30 } as const, 30],
      ["milliseconds rounded up", { kind: "milliseconds", milliseconds: 1_200 } as const, 2],
      [
        "absolute date as unix seconds",
        { kind: "until", expiresAt: new Date("2024-01-15T11:00:00.000Z") } as const,
        1705316400,
      ],
    ])("%s", async (_label, expire, expires) => {
      await storage.setValue(keys.one(), bytes.a(), expire)

      expect(client.store.get(keys.one())?.expires).toBe(expires)
    })

    it("turns relative expirations beyond 30 days into unix timestamps", async () => {
      const sixtyDays = 60 * 24 * 60 * 60

      await storage.setValue(keys.one(), bytes.a(), { kind: "seconds", seconds: sixtyDays })

      expect(client.store.get(keys.one())?.expires).toBe(1705314600 + sixtyDays)
    })

    it("keeps a date before 1970-01-31 absolute", async () => {
      await storage.setValue(keys.one(), bytes.a(), { kind: "until", expiresAt: new Date(0) })

      expect(client.store.get(keys.one())?.expires).toBe(2_592_001)
    })

    it("touch sends the new expiry", async () => {
      await storage.setValue(keys.one(), bytes.a(), null)

      await storage.touchValue(keys.one(), { kind: "seconds", seconds: 5 })

      expect(client.store.get(keys.one())?.expires).toBe(5)
    })
  })

  describe("bulk verbs", () => {
    it("getManyValues uses one multi-get and aligns results", async () => {
      await storage.setValue(keys.one(), bytes.a(), null)
      await storage.setValue(keys.three(), bytes.c(), null)
      const spy = vi.spyOn(client, "getMulti")

      const res = await storage.getManyValues([keys.one(), keys.two(), keys.three()])

      expect(spy).toHaveBeenCalledExactlyOnceWith([keys.one(), keys.two(), keys.three()])
      expect(res).toStrictEqual([bytes.a(), NOT_FOUND, bytes.c()])
    })

    it.each([
      ["setManyValues", (s: MemcacheStorage) => s.setManyValues([keys.one()], [bytes.a()], null)],
      ["deleteManyValues", (s: MemcacheStorage) => s.deleteManyValues([keys.one()])],
      ["hasManyValues", (s: MemcacheStorage) => s.hasManyValues([keys.one()])],
      ["touchManyValues", (s: MemcacheStorage) => s.touchManyValues([keys.one()], null)],
    ])("%s is not implemented and never reaches the client", async (verb, call) => {
      const set = vi.spyOn(client, "set")
      const del = vi.spyOn(client, "delete")
      const touch = vi.spyOn(client, "touch")

      await expect(call(storage)).rejects.toMatchObject({
        code: "not_implemented",
        context: { adapter: "memcache", verb },
      })
      expect(set).not.toHaveBeenCalled()
      expect(del).not.toHaveBeenCalled()
      expect(touch).not.toHaveBeenCalled()
    })
  })

  it("hashes keys memcached would reject", () => {
    expect(storage.refactorKey("users:1")).toBe("users:1")
    expect(storage.refactorKey("users:with space")).toMatch(/^[0-9a-f]{40}$/)
  })
})
