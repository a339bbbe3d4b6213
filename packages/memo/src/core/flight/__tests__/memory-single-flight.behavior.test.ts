import { Deferred } from "../../../tests/utils/deferred"
import { MemorySingleflight } from "../memory-single-flight"

describe("MemorySingleflight behavior", () => {
  let singleflight: MemorySingleflight

  beforeEach(() => {
    singleflight = new MemorySingleflight()
  })

  describe("run", () => {
    it("shares one call between concurrent callers of a key", async () => {
      const gate = new Deferred<string>()
      const fn = vi.fn(() => gate.promise)

      const first = singleflight.run("users:1", fn)
      const second = singleflight.run("users:1", fn)
      gate.resolve("value")

      const [a, b] = await Promise.all([first, second])

      expect(fn).toHaveBeenCalledTimes(1)
      expect(a).toStrictEqual({ value: "value", isLeader: true, sharedWith: 1, source: "leader" })
      expect(b).toStrictEqual({
        value: "value",
        isLeader: false,
        sharedWith: 1,
        source: "inflight",
      })
    })

    it("keeps keys independent", async () => {
      const fn = vi.fn(async () => "v")

      await Promise.all([singleflight.run("a", fn), singleflight.run("b", fn)])

      expect(fn).toHaveBeenCalledTimes(2)
    })

    it("shares a rejection with every waiter", async () => {
      const gate = new Deferred<string>()
      const failure = new Error("backend down")

      const first = singleflight.run("k", () => gate.promise)
      const second = singleflight.run("k", () => gate.promise)
      gate.reject(failure)

      await expect(first).rejects.toBe(failure)
      await expect(second).rejects.toBe(failure)
      expect(singleflight.size).toBe(0)
    })

    it("starts fresh once a flight settled", async () => {
      await singleflight.run("k", async () => "first")

      const result = await singleflight.run("k", async () => "second")

      expect(result.value).toBe("second")
      expect(result.isLeader).toBe(true)
    })

    it("tracks flights in progress", async () => {
      const gate = new Deferred<string>()

      const flight = singleflight.run("k", () => gate.promise)
      expect(singleflight.size).toBe(1)

      gate.resolve("v")
      await flight

      expect(singleflight.size).toBe(0)
    })
  })

  describe("forget", () => {
    it("lets the next caller start a fresh flight", async () => {
      const gate1 = new Deferred<string>()
      const gate2 = new Deferred<string>()

      const first = singleflight.run("k", () => gate1.promise)
      singleflight.forget("k")
      const second = singleflight.run("k", () => gate2.promise)

      gate1.resolve("value1")
      gate2.resolve("value2")

      const [a, b] = await Promise.all([first, second])

      expect(a.value).toBe("value1")
      expect(b.value).toBe("value2")
      expect(b.isLeader).toBe(true)
    })

    it("existing waiters still receive the result", async () => {
      const gate = new Deferred<string>()

      const first = singleflight.run("k", () => gate.promise)
      const second = singleflight.run("k", () => gate.promise)

      singleflight.forget("k")
      gate.resolve("value")

      const [a, b] = await Promise.all([first, second])

      expect(a.value).toBe("value")
      expect(b.value).toBe("value")
    })

    it("a forgotten flight does not remove its successor", async () => {
      const gate1 = new Deferred<string>()
      const gate2 = new Deferred<string>()

      const first = singleflight.run("k", () => gate1.promise)
      singleflight.forget("k")
      const second = singleflight.run("k", () => gate2.promise)

      gate1.resolve("value1")
      await first

      expect(singleflight.size).toBe(1)

      gate2.resolve("value2")
      await second
    })
  })
})
