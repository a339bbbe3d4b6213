import { Config } from "../config"

describe("Config", () => {
  const data = { REDIS_BATCH_SIZE: 500, LOG_PRETTY: false, KEY_PREFIX: "app" }
  const provenance = {
    REDIS_BATCH_SIZE: "env:HALYARD_",
    LOG_PRETTY: "default",
    KEY_PREFIX: "object:overrides",
  }
  const providedKeys = new Set(["REDIS_BATCH_SIZE", "KEY_PREFIX", "STALE_KEY"])

  const config = new Config(data, provenance, providedKeys)

  it("exposes the validated values", () => {
    expect(config.value.REDIS_BATCH_SIZE).toBe(500)
    expect(config.value.KEY_PREFIX).toBe("app")
  })

  it("freezes the values", () => {
    expect(Object.isFrozen(config.value)).toBe(true)
  })

  it("lists schema keys only", () => {
    expect(config.keys().sort()).toEqual(["KEY_PREFIX", "LOG_PRETTY", "REDIS_BATCH_SIZE"])
  })

  describe("explain", () => {
    it("names the winning source", () => {
      expect(config.explain("REDIS_BATCH_SIZE")).toBe("env:HALYARD_")
      expect(config.explain("KEY_PREFIX")).toBe("object:overrides")
    })

    it("reports schema defaults", () => {
      expect(config.explain("LOG_PRETTY")).toBe("default")
    })

    it("falls back to default for keys without provenance", () => {
      const bare = new Config({ LOG_LEVEL: "info" }, {}, new Set())

      expect(bare.explain("LOG_LEVEL")).toBe("default")
    })
  })

  it("lists each source once", () => {
    expect(config.sourcesUsed().sort()).toEqual(["default", "env:HALYARD_", "object:overrides"])
  })

  it("reports provided keys the schema dropped", () => {
    expect(config.unknownKeys()).toEqual(["STALE_KEY"])
  })
})
