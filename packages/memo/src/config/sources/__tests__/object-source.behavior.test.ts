import { ObjectSource } from "../object-source"

describe("ObjectSource behavior", () => {
  it("returns the given values", async () => {
    await expect(new ObjectSource({ KEY_PREFIX: "app" }).load()).resolves.toEqual({
      KEY_PREFIX: "app",
    })
  })

  it("is named after its label", () => {
    expect(new ObjectSource({}).name).toBe("object:overrides")
    expect(new ObjectSource({}, "tests").name).toBe("object:tests")
  })

  it("does not leak the backing object", async () => {
    const values: Record<string, unknown> = { KEY_PREFIX: "app" }
    const source = new ObjectSource(values)

    const loaded = await source.load()
    loaded.KEY_PREFIX = "changed"

    expect(values.KEY_PREFIX).toBe("app")
    await expect(source.load()).resolves.toEqual({ KEY_PREFIX: "app" })
  })
})
