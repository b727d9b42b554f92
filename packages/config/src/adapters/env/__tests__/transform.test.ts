import { defaultSafeEnvOptions } from "../safe-env-options"
import { processKey, transformSnapshot } from "../transform"

const defaults = defaultSafeEnvOptions("PFX")

describe("processKey", () => {
  it("lower-cases, strips the prefix and nests on the key separator", () => {
    expect(processKey("PFX_SERVER__PORT", defaults)).toBe("server.port")
    expect(processKey("pfx_Db__Host", defaults)).toBe("db.host")
  })

  it("keeps separators when the key separator is empty", () => {
    expect(processKey("PFX_SERVER__PORT", { ...defaults, keySeparator: "" })).toBe("server__port")
  })

  it("splits on a single-character key separator", () => {
    expect(processKey("PFX_A_B", { ...defaults, keySeparator: "_" })).toBe("a.b")
  })

  it("leaves the prefix when the prefix separator does not follow it", () => {
    expect(processKey("PFX_FOO", { ...defaults, prefixSeparator: "-" })).toBe("pfx_foo")
  })
})

describe("transformSnapshot", () => {
  const snapshot = new Map([
    ["PFX_FOO__BAR", "1"],
    ["PFX_BAZ", "hello"],
  ])

  it("produces key paths and typed values", () => {
    const values = transformSnapshot(snapshot, defaults)

    expect(Object.fromEntries(values)).toEqual({
      "foo.bar": { kind: "integer", value: 1n, origin: "the environment" },
      baz: { kind: "string", value: "hello", origin: "the environment" },
    })
  })

  it("returns an equal, fresh map on every call", () => {
    const first = transformSnapshot(snapshot, defaults)
    const second = transformSnapshot(snapshot, defaults)

    expect(second).not.toBe(first)
    expect(Object.fromEntries(second)).toEqual(Object.fromEntries(first))
    expect(snapshot.size).toBe(2)
  })

  it("lets the later raw key win when two keys normalize to one path", () => {
    const values = transformSnapshot(
      new Map([
        ["pfx_a", "2"],
        ["PFX_A", "1"],
      ]),
      defaults,
    )

    expect(values.get("a")).toEqual({ kind: "integer", value: 2n, origin: "the environment" })
  })

  it("tags values with the configured origin", () => {
    const values = transformSnapshot(snapshot, { ...defaults, origin: "dotenv:.env" })

    expect(values.get("baz")?.origin).toBe("dotenv:.env")
  })
})
