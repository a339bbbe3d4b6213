import { ObjectSource } from "../sources/object-source"
import {
  loadMemoConfig,
  loggerOptionsFromConfig,
  redisOptionsFromConfig,
  ringDefaultsFromConfig,
} from "../memo-config"
import { ConfigValidationError } from "../../core/errors"

const load = (values: Record<string, unknown>) =>
  loadMemoConfig({ sources: [new ObjectSource(values)] })

describe("memo config", () => {
  it("defaults every optional setting", async () => {
    const config = await load({})

    expect(config.value).toEqual({
      LOG_LEVEL: "info",
      LOG_PRETTY: false,
      REDIS_BATCH_SIZE: 1000,
      REDIS_KEYSPACE_PREFIX: "",
    })
  })

  it("parses string flags and numbers", async () => {
    const config = await load({
      LOG_LEVEL: "debug",
      LOG_PRETTY: "true",
      EXPIRE_SECONDS: "60",
      REDIS_URL: "redis://localhost:6379",
      REDIS_BATCH_SIZE: "250",
    })

    expect(config.value).toMatchObject({
      LOG_LEVEL: "debug",
      LOG_PRETTY: true,
      EXPIRE_SECONDS: 60,
      REDIS_URL: "redis://localhost:6379",
      REDIS_BATCH_SIZE: 250,
    })
  })

  it.each([
    ["LOG_LEVEL", "verbose"],
    ["REDIS_BATCH_SIZE", "0"],
    ["EXPIRE_SECONDS", "-1"],
    ["REDIS_URL", "not a url"],
    ["KEY_PREFIX", ""],
  ])("rejects %s=%j", async (key, value) => {
    await expect(load({ [key]: value })).rejects.toBeInstanceOf(ConfigValidationError)
  })

  describe("ringDefaultsFromConfig", () => {
    it("is empty when nothing is configured", async () => {
      expect(ringDefaultsFromConfig(await load({}))).toEqual({})
    })

    it("maps prefix and expiry", async () => {
      const config = await load({ KEY_PREFIX: "app", EXPIRE_SECONDS: "30" })

      expect(ringDefaultsFromConfig(config)).toEqual({
        keyPrefix: "app",
        expire: { kind: "seconds", seconds: 30 },
      })
    })

    it("maps an expiry of zero to persistent", async () => {
      expect(ringDefaultsFromConfig(await load({ EXPIRE_SECONDS: "0" }))).toEqual({ expire: null })
    })
  })

  it("derives logger options", async () => {
    const config = await load({ LOG_LEVEL: "warn", LOG_PRETTY: "1" })

    expect(loggerOptionsFromConfig(config)).toEqual({ level: "warn", prettify: true })
  })

  it("derives redis adapter options", async () => {
    const config = await load({ REDIS_BATCH_SIZE: "10", REDIS_KEYSPACE_PREFIX: "tenant-a:" })

    expect(redisOptionsFromConfig(config)).toEqual({ batchSize: 10, keyspacePrefix: "tenant-a:" })
  })
})
