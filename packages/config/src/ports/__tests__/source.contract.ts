import type { ConfigSource } from "../source"

export type ConfigSourceContractOptions = {
  name: string
  make: () => ConfigSource
  expectedValue: Record<string, unknown>
}

export function describeConfigSourceContract(opts: ConfigSourceContractOptions) {
  describe(`${opts.name} (contract)`, () => {
    it("has a non-empty name", () => {
      expect(opts.make().name.length).toBeGreaterThan(0)
    })

    it("loads the expected values", async () => {
      await expect(opts.make().load()).resolves.toEqual(opts.expectedValue)
    })

    it("returns a fresh object on every load", async () => {
      const source = opts.make()

      const first = await source.load()
      first.INJECTED = "mutated"

      const second = await source.load()

      expect(second).not.toHaveProperty("INJECTED")
    })
  })
}
