import { EnvSource } from "../env-source"

describe("EnvSource (behavior)", () => {
  it("returns every variable when no prefix is set", async () => {
    const source = new EnvSource({
      env: { CACHE_CAPACITY: "100", CACHE_EVICTION_POLICY: "lfu" },
    })

    await expect(source.load()).resolves.toEqual({
      CACHE_CAPACITY: "100",
      CACHE_EVICTION_POLICY: "lfu",
    })
  })

  it("keeps only prefixed variables and strips the prefix", async () => {
    const source = new EnvSource({
      prefix: "APP_",
      env: {
        APP_CACHE_CAPACITY: "100",
        APP_LOG_LEVEL: "debug",
        OTHER_KEY: "ignored",
        PATH: "/usr/bin",
      },
    })

    await expect(source.load()).resolves.toEqual({
      CACHE_CAPACITY: "100",
      LOG_LEVEL: "debug",
    })
  })

  it("reads process.env when no env is injected", async () => {
    vi.stubEnv("EVICTKIT_TEST_MARKER", "present")

    try {
      const values = await new EnvSource({ prefix: "EVICTKIT_TEST_" }).load()

      expect(values).toEqual({ MARKER: "present" })
    } finally {
      vi.unstubAllEnvs()
    }
  })
})
