import { z } from "zod"
import { createSafeEnvSource } from "../../adapters/env/safe-env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import type { ConfigSource } from "../../ports/source"
import { CaptureLogger } from "../../tests/utils/capture-logger"
import { fixedReader } from "../../tests/utils/fixed-reader"
import { ConfigError } from "../errors"
import { loadConfig } from "../load"

const schema = z.object({
  server: z.object({
    host: z.string().default("localhost"),
    port: z.number(),
  }),
  debug: z.boolean().default(false),
  hosts: z.array(z.string()).default([]),
})

function envSource(vars: Record<string, string>) {
  return createSafeEnvSource(
    { prefix: "APP", listParseKeys: ["hosts"] },
    { reader: fixedReader(vars) },
  )
}

describe("loadConfig e2e", () => {
  it("layers sources with later ones winning per leaf", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        envSource({ APP_SERVER__PORT: "8080", APP_HOSTS: "a,b" }),
        new ObjectSource({ "server.port": 9090 }, "cli"),
      ],
    })

    expect(config.value).toEqual({
      server: { host: "localhost", port: 9090 },
      debug: false,
      hosts: ["a", "b"],
    })
  })

  it("records provenance per leaf", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        envSource({ APP_SERVER__PORT: "8080", APP_HOSTS: "a,b" }),
        new ObjectSource({ "server.port": 9090 }, "cli"),
      ],
    })

    expect(config.explain("server.port")).toBe("cli")
    expect(config.explain("hosts")).toBe("the environment")
    expect(config.explain("server.host")).toBe("default")
    expect(config.explain("debug")).toBe("default")
    expect(config.sourcesUsed()).toEqual(["the environment", "cli"])
  })

  it("never lets undefined override a value", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        envSource({ APP_SERVER__PORT: "8080" }),
        new ObjectSource({ "server.port": undefined }),
      ],
    })

    expect(config.get("server").port).toBe(8080)
    expect(config.explain("server.port")).toBe("the environment")
  })

  it("keeps earlier leaves under an empty object from a later source", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        envSource({ APP_SERVER__PORT: "8080", APP_SERVER__HOST: "api.internal" }),
        new ObjectSource({ server: {} }, "cli"),
      ],
    })

    expect(config.get("server")).toEqual({ host: "api.internal", port: 8080 })
    expect(config.explain("server.port")).toBe("the environment")
    expect(config.explain("server.host")).toBe("the environment")
    expect(config.sourcesUsed()).toEqual(["the environment"])
  })

  it("reports keys the schema drops", async () => {
    const config = await loadConfig({
      schema,
      sources: [envSource({ APP_SERVER__PORT: "8080", APP_EXTRA__FLAG: "on" })],
    })

    expect(config.unknownKeys()).toEqual(["extra.flag"])
  })

  it("throws config_validation_failed with the issue paths", async () => {
    const error = await loadConfig({
      schema,
      sources: [envSource({ APP_SERVER__PORT: "not-a-port" })],
    }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ConfigError)
    if (!(error instanceof ConfigError)) return

    expect(error.code).toBe("config_validation_failed")
    expect(error.message).toMatch(/^Configuration validation failed:\n/)
    expect(error.context.issues).toEqual([
      { path: "server.port", message: expect.any(String) },
    ])
  })

  it("wraps a failing source in config_source_failed", async () => {
    const cause = new Error("connection refused")
    const broken: ConfigSource = {
      name: "broken",
      load: async () => {
        throw cause
      },
    }

    const error = await loadConfig({ schema, sources: [broken] }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ConfigError)
    if (!(error instanceof ConfigError)) return

    expect(error.code).toBe("config_source_failed")
    expect(error.context).toEqual({ source: "broken" })
    expect(error.cause).toBe(cause)
  })

  it("rethrows application errors from a source unchanged", async () => {
    const inner = new ConfigError("nested failure", {
      code: "config_source_failed",
      context: { source: "inner" },
    })
    const source: ConfigSource = {
      name: "outer",
      load: async () => {
        throw inner
      },
    }

    await expect(loadConfig({ schema, sources: [source] })).rejects.toBe(inner)
  })

  it("logs each loaded source at debug level", async () => {
    const logger = new CaptureLogger()

    await loadConfig({
      schema,
      sources: [envSource({ APP_SERVER__PORT: "8080" }), new ObjectSource({ debug: true }, "cli")],
      logger,
    })

    expect(logger.entries.filter((e) => e.meta.module === "config")).toEqual([
      {
        level: "debug",
        message: "Loaded configuration source",
        meta: {
          module: "config",
          source: "the environment",
          durationMs: expect.any(Number),
          counts: { keys: 1 },
        },
      },
      {
        level: "debug",
        message: "Loaded configuration source",
        meta: {
          module: "config",
          source: "cli",
          durationMs: expect.any(Number),
          counts: { keys: 1 },
        },
      },
    ])
  })

  describe("with the process environment", () => {
    beforeEach(() => {
      process.env.ENVLAYER_E2E_SERVER__PORT = "7070"
      process.env.ENVLAYER_E2E_DEBUG = "TRUE"
    })

    afterEach(() => {
      delete process.env.ENVLAYER_E2E_SERVER__PORT
      delete process.env.ENVLAYER_E2E_DEBUG
    })

    it("reads prefixed variables from process.env", async () => {
      const config = await loadConfig({
        schema,
        sources: [createSafeEnvSource({ prefix: "ENVLAYER_E2E" })],
      })

      expect(config.value).toEqual({
        server: { host: "localhost", port: 7070 },
        debug: true,
        hosts: [],
      })
      expect(config.explain("debug")).toBe("the environment")
    })
  })
})
