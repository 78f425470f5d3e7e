import { z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { ConfigValidationError } from "../errors"
import { loadConfig } from "../load"

const schema = z.object({
  CACHE_CAPACITY: z.coerce.number().int().positive(),
  CACHE_NAME: z.string().default("default"),
})

describe("loadConfig", () => {
  it("validates and coerces the merged values", async () => {
    const config = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { CACHE_CAPACITY: "32" } })],
    })

    expect(config.value).toEqual({ CACHE_CAPACITY: 32, CACHE_NAME: "default" })
  })

  it("lets later sources override earlier ones", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new EnvSource({ env: { CACHE_CAPACITY: "32", CACHE_NAME: "from-env" } }),
        new ObjectSource({ CACHE_CAPACITY: 8 }),
      ],
    })

    expect(config.value.CACHE_CAPACITY).toBe(8)
    expect(config.value.CACHE_NAME).toBe("from-env")
    expect(config.explain("CACHE_CAPACITY")).toBe("object:overrides")
    expect(config.explain("CACHE_NAME")).toBe("env")
  })

  it("skips undefined values instead of overriding", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new EnvSource({ env: { CACHE_CAPACITY: "32" } }),
        new ObjectSource({ CACHE_CAPACITY: undefined }),
      ],
    })

    expect(config.value.CACHE_CAPACITY).toBe(32)
    expect(config.explain("CACHE_CAPACITY")).toBe("env")
  })

  it("marks schema defaults as coming from default", async () => {
    const config = await loadConfig({
      schema,
      sources: [new ObjectSource({ CACHE_CAPACITY: 4 })],
    })

    expect(config.explain("CACHE_NAME")).toBe("default")
    expect(config.sourcesUsed()).toEqual(["object:overrides", "default"])
  })

  it("reports keys outside the schema", async () => {
    const config = await loadConfig({
      schema,
      sources: [new ObjectSource({ CACHE_CAPACITY: 4, CACHE_TTL: 60 })],
    })

    expect(config.unknownKeys()).toEqual(["CACHE_TTL"])
  })

  it("throws ConfigValidationError with one issue per failing key", async () => {
    const load = loadConfig({
      schema,
      sources: [new ObjectSource({ CACHE_CAPACITY: "-3" })],
    })

    await expect(load).rejects.toBeInstanceOf(ConfigValidationError)
    await expect(load).rejects.toMatchObject({
      code: "config_validation_failed",
      context: { issues: [expect.stringMatching(/^CACHE_CAPACITY: /)] },
    })
  })
})
