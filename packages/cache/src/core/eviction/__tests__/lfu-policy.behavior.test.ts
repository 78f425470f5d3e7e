import { LfuPolicy } from "../lfu-policy"

describe("LfuPolicy (behavior)", () => {
  let policy: LfuPolicy<string>

  beforeEach(() => {
    policy = new LfuPolicy()
  })

  it("starts every key at frequency 1", () => {
    policy.onInsert("a")

    expect(policy.frequencyOf("a")).toBe(1)
  })

  it("counts accesses and re-inserts", () => {
    policy.onInsert("a")
    policy.onAccess("a")
    policy.onInsert("a")

    expect(policy.frequencyOf("a")).toBe(3)
  })

  it("names the key with the lowest frequency", () => {
    policy.onInsert("a")
    policy.onInsert("b")
    policy.onAccess("a")

    expect(policy.victim()).toBe("b")
  })

  it("breaks ties by the earliest key inserted at that frequency", () => {
    policy.onInsert("a")
    policy.onInsert("b")
    policy.onInsert("c")

    expect(policy.victim()).toBe("a")
  })

  it("breaks ties at higher counts by the order keys reached the count", () => {
    policy.onInsert("a")
    policy.onInsert("b")
    policy.onAccess("b")
    policy.onAccess("a")

    expect(policy.frequencyOf("a")).toBe(2)
    expect(policy.frequencyOf("b")).toBe(2)
    expect(policy.victim()).toBe("b")
  })

  it("a new key becomes the victim over frequently used ones", () => {
    policy.onInsert("a")
    policy.onAccess("a")
    policy.onInsert("b")
    policy.onAccess("b")
    policy.onInsert("c")

    expect(policy.victim()).toBe("c")
  })

  it("finds the next lowest frequency when the lowest bucket is evicted", () => {
    policy.onInsert("a")
    policy.onAccess("a")
    policy.onAccess("a")
    policy.onInsert("b")
    policy.onAccess("b")
    policy.onInsert("c")

    policy.onEvict("c")

    expect(policy.victim()).toBe("b")

    policy.onEvict("b")

    expect(policy.victim()).toBe("a")
  })

  it("forgets the frequency of an evicted key", () => {
    policy.onInsert("a")
    policy.onAccess("a")
    policy.onEvict("a")

    expect(policy.frequencyOf("a")).toBeUndefined()

    policy.onInsert("a")

    expect(policy.frequencyOf("a")).toBe(1)
  })

  describe("many distinct frequencies", () => {
    beforeEach(() => {
      for (let i = 0; i < 10; i++) {
        policy.onInsert(`k:${i}`)
        for (let reads = 0; reads < i * 2; reads++) policy.onAccess(`k:${i}`)
      }
    })

    it("keeps one bucket per count in ascending order", () => {
      expect(policy.frequencies()).toEqual([1, 3, 5, 7, 9, 11, 13, 15, 17, 19])
    })

    it("drains victims from the lowest count upwards", () => {
      const drained: string[] = []

      for (let victim = policy.victim(); victim !== undefined; victim = policy.victim()) {
        drained.push(victim)
        policy.onEvict(victim)
      }

      expect(drained).toEqual([
        "k:0",
        "k:1",
        "k:2",
        "k:3",
        "k:4",
        "k:5",
        "k:6",
        "k:7",
        "k:8",
        "k:9",
      ])
      expect(policy.frequencies()).toEqual([])
    })

    it("unlinks buckets emptied out of order", () => {
      policy.onEvict("k:4")
      policy.onEvict("k:0")
      policy.onEvict("k:9")

      expect(policy.frequencies()).toEqual([3, 5, 7, 11, 13, 15, 17])
      expect(policy.victim()).toBe("k:1")
    })

    it("places a new key in a fresh lowest bucket", () => {
      policy.onEvict("k:0")
      policy.onInsert("fresh")

      expect(policy.frequencies()[0]).toBe(1)
      expect(policy.victim()).toBe("fresh")
    })

    it("merges an accessed key into the next existing bucket", () => {
      policy.onAccess("k:1")
      policy.onAccess("k:1")

      expect(policy.frequencyOf("k:1")).toBe(5)
      expect(policy.frequencies()).toEqual([1, 5, 7, 9, 11, 13, 15, 17, 19])

      policy.onEvict("k:0")

      expect(policy.victim()).toBe("k:2")
    })
  })
})
