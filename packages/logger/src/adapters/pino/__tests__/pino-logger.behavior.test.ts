import { Writable } from "node:stream"
import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = String(chunk).trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

function parse(line: string | undefined): Record<string, unknown> {
  return JSON.parse(line ?? "{}")
}

describe("PinoLogger (behavior)", () => {
  it("writes JSON lines with the bindings and meta", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { service: "api" })

    logger.info("cache ready", { cache: "users", capacity: 100 })

    expect(lines).toHaveLength(1)
    expect(parse(lines[0])).toMatchObject({
      level: 30,
      msg: "cache ready",
      service: "api",
      cache: "users",
      capacity: 100,
    })
  })

  it("drops entries below the configured level", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "warn" })

    logger.debug("evicted")
    logger.info("hit")
    logger.warn("listener slow")

    expect(lines).toHaveLength(1)
    expect(parse(lines[0])).toMatchObject({ level: 40, msg: "listener slow" })
  })

  it("child() shares the sink and level and adds its bindings", () => {
    const { lines, destination } = makeLineDestination()

    const root = new PinoLogger({ destination }, { level: "debug" }, { service: "api" })
    const child = root.child({ module: "eviction-cache", policy: "lru" })

    child.trace("ignored")
    child.debug("evicted", { key: "a" })

    expect(lines).toHaveLength(1)
    expect(parse(lines[0])).toMatchObject({
      level: 20,
      msg: "evicted",
      service: "api",
      module: "eviction-cache",
      policy: "lru",
      key: "a",
    })
  })

  it("serializes err with its cause", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "info" })

    logger.error("listener failed", {
      err: new Error("outer", { cause: new Error("inner") }),
    })

    expect(parse(lines[0])).toMatchObject({
      level: 50,
      msg: "listener failed",
      err: {
        type: "Error",
        message: "outer",
        cause: { type: "Error", message: "inner" },
      },
    })
  })
})
