import { isAppError } from "@envlayer/errors"
import { createNullLogger, type Logger } from "@envlayer/logger"
import { type ZodType, z } from "zod"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./errors"
import { flattenLeaves, isPlainObject, PATH_DELIMITER, setPath } from "./value"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  sources: ConfigSource[]
  logger?: Logger
}

function isEmptyObject(value: unknown): boolean {
  return isPlainObject(value) && Object.keys(value).length === 0
}

async function loadSource(source: ConfigSource): Promise<Record<string, unknown>> {
  try {
    return await source.load()
  } catch (cause) {
    if (isAppError(cause)) throw cause

    throw new ConfigError(`Failed to load configuration source "${source.name}"`, {
      code: "config_source_failed",
      context: { source: source.name },
      cause,
    })
  }
}

/**
 * Loads every source in order, merges them leaf by leaf (later sources win,
 * `undefined` never overrides) and validates the result against `schema`.
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
  logger,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const log = (logger ?? createNullLogger()).child({ module: "config" })
  const merged: Record<string, unknown> = {}
  const provenance = new Map<string, string>()

  for (const source of sources) {
    const started = performance.now()
    const values = await loadSource(source)
    let keys = 0

    for (const [segments, value] of flattenLeaves(values)) {
      // An empty object adds no leaves, so it must not replace the subtree under it.
      if (value === undefined || isEmptyObject(value)) continue

      setPath(merged, segments, value)
      provenance.set(segments.join(PATH_DELIMITER), source.name)
      keys++
    }

    log.debug("Loaded configuration source", {
      source: source.name,
      durationMs: performance.now() - started,
      counts: { keys },
    })
  }

  // A leaf replaced by an object (or the reverse) leaves stale provenance behind.
  const mergedPaths = new Set(
    Array.from(flattenLeaves(merged), ([segments]) => segments.join(PATH_DELIMITER)),
  )
  for (const path of provenance.keys()) {
    if (!mergedPaths.has(path)) provenance.delete(path)
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigError(`Configuration validation failed:\n${z.prettifyError(result.error)}`, {
      code: "config_validation_failed",
      context: {
        issues: result.error.issues.map((issue) => ({
          path: issue.path.map(String).join(PATH_DELIMITER),
          message: issue.message,
        })),
      },
    })
  }

  for (const [segments] of flattenLeaves(result.data)) {
    const path = segments.join(PATH_DELIMITER)
    if (!provenance.has(path)) provenance.set(path, "default")
  }

  return new Config<T>(result.data, provenance, mergedPaths)
}
