import { Writable } from "node:stream"
import pino from "pino"
import { logLevelNames } from "../../../ports/log-level"
import { createPinoLogger, PinoLogger } from "../pino-logger"
import { levelName } from "./pino-harness"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

function parse(line: string | undefined): Record<string, unknown> {
  return JSON.parse(line ?? "null")
}

describe("PinoLogger behavior", () => {
  it("maps every level name to a pino level", () => {
    expect(logLevelNames.map((name) => pino.levels.values[name])).toEqual([10, 20, 30, 40, 50, 60])
    expect(logLevelNames.map((name) => levelName(pino.levels.values[name]))).toEqual([
      ...logLevelNames,
    ])
    expect(levelName(35)).toBeUndefined()
  })

  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { service: "billing" },
    )

    logger.info("snapshot taken", { source: "the environment", counts: { kept: 2 } })

    expect(lines).toHaveLength(1)

    const payload = parse(lines[0])

    expect(payload).toMatchObject({
      msg: "snapshot taken",
      service: "billing",
      source: "the environment",
      counts: { kept: 2 },
    })
    expect(typeof payload.time).toBe("number")
    expect(payload.level).toBe(30)
  })

  it("defaults to pino's info level", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createPinoLogger({ destination })

    logger.debug("ignored")
    logger.info("kept")

    expect(lines).toHaveLength(1)
    expect(parse(lines[0]).msg).toBe("kept")
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" })
    const err = new Error("load failed", { cause: new Error("ENOENT") })

    logger.error("failed", { err })

    const payload = parse(lines[0])

    expect(payload.err).toMatchObject({
      type: "Error",
      message: "load failed",
      cause: { type: "Error", message: "ENOENT" },
    })
  })

  it("child() inherits the base logger sink and config", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger(
      { destination },
      { level: "warn", prettify: false },
      { service: "billing" },
    )
    const child = base.child({ module: "config" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parse(lines[0])).toMatchObject({
      msg: "logged",
      service: "billing",
      module: "config",
    })
  })

  it("derives from an existing pino instance", () => {
    const { lines, destination } = makeLineDestination()

    const base = pino({ level: "debug" }, destination)
    const logger = new PinoLogger({ base }, {}, { module: "config" })

    logger.debug("from base")

    expect(parse(lines[0])).toMatchObject({ msg: "from base", module: "config", level: 20 })
  })
})
