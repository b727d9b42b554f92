import { createNullLogger, type Logger } from "@envlayer/logger"
import { ConfigError } from "../../core/errors"
import { err, ok } from "../../core/result"
import { toPlainObject } from "../../core/value"
import type { ConfigResult } from "../../ports/result"
import type { ConfigSource, ValueSource } from "../../ports/source"
import type { ValueMap } from "../../ports/value"
import {
  processEnvironmentReader,
  type RawEnvironmentEntry,
  type RawEnvironmentReader,
} from "./raw-environment"
import { defaultSafeEnvOptions, type SafeEnvOptions } from "./safe-env-options"
import { type EnvKeyFilter, type RawEnvironmentSnapshot, snapshotEnvironment } from "./snapshot"
import { transformSnapshot } from "./transform"

export type SafeEnvSourceDeps = {
  /**
   * Where raw entries come from.
   * @default a one-pass copy of process.env
   */
  reader?: RawEnvironmentReader

  logger?: Logger

  /**
   * Provenance tag and source name.
   * @default "the environment"
   */
  origin?: string
}

/**
 * Environment configuration source that never fails on non-Unicode entries
 * and never observes the environment mid-change.
 *
 * The environment is read exactly once, when the source is created. Builder
 * methods return new sources over the same snapshot, and `collect()` / `load()`
 * always work from it: a fresh read needs a new source.
 *
 * @example
 * ```ts
 * const result = SafeEnvSource.withPrefixAndFilter("APP", (key) => !key.startsWith("INTERNAL"))
 * if (!result.ok) throw result.error
 *
 * const source = result.value.withListParseKey("server.hosts")
 * // APP_SERVER__HOSTS=a,b  →  "server.hosts": ["a", "b"]
 * ```
 */
export class SafeEnvSource implements ConfigSource, ValueSource {
  readonly name: string

  private constructor(
    readonly options: SafeEnvOptions,
    readonly snapshot: RawEnvironmentSnapshot,
    private readonly logger: Logger,
  ) {
    this.name = options.origin
  }

  /**
   * Snapshots the entries whose key starts with `"<prefix>_"` and whose
   * remaining suffix passes `filter`. Entries that are not valid Unicode are
   * skipped.
   *
   * Fails only when an injected reader throws; `filter` exceptions propagate.
   */
  static withPrefixAndFilter(
    prefix: string,
    filter: EnvKeyFilter,
    deps: SafeEnvSourceDeps = {},
  ): ConfigResult<SafeEnvSource, ConfigError> {
    const options = defaultSafeEnvOptions(prefix, deps.origin)
    const logger = (deps.logger ?? createNullLogger()).child({
      module: "config/env",
      source: options.origin,
    })
    const reader = deps.reader ?? processEnvironmentReader

    let entries: RawEnvironmentEntry[]

    try {
      entries = Array.from(reader())
    } catch (cause) {
      return err(
        new ConfigError(`Failed to read entries for configuration source "${options.origin}"`, {
          code: "config_source_failed",
          context: { source: options.origin },
          cause,
        }),
      )
    }

    const { snapshot, stats } = snapshotEnvironment(prefix, filter, entries)

    logger.debug("Captured environment snapshot", {
      counts: { entries: stats.entries, kept: stats.kept, ...stats.dropped },
    })

    return ok(new SafeEnvSource(options, snapshot, logger))
  }

  keySeparator(separator: string): SafeEnvSource {
    return this.with({ keySeparator: separator })
  }

  prefixSeparator(separator: string): SafeEnvSource {
    return this.with({ prefixSeparator: separator })
  }

  tryParsing(enabled: boolean): SafeEnvSource {
    return this.with({ tryParsing: enabled })
  }

  listSeparator(separator: string): SafeEnvSource {
    return this.with({ listSeparator: separator })
  }

  /** Adds one processed key path, e.g. `"server.hosts"`, to the list-parse set. */
  withListParseKey(key: string): SafeEnvSource {
    const keys = new Set(this.options.listParseKeys)
    keys.add(key)

    return this.with({ listParseKeys: keys })
  }

  clone(): SafeEnvSource {
    return new SafeEnvSource(this.options, this.snapshot, this.logger)
  }

  collect(): ConfigResult<ValueMap, ConfigError> {
    const values = transformSnapshot(this.snapshot, this.options)

    this.logger.debug("Collected environment values", { counts: { keys: values.size } })

    return ok(values)
  }

  async load(): Promise<Record<string, unknown>> {
    const result = this.collect()
    if (!result.ok) throw result.error

    return toPlainObject(result.value)
  }

  private with(patch: Partial<SafeEnvOptions>): SafeEnvSource {
    return new SafeEnvSource(
      Object.freeze({ ...this.options, ...patch }),
      this.snapshot,
      this.logger,
    )
  }
}

export type SafeEnvSourceInit = {
  prefix: string

  /** @default accepts every key */
  filter?: EnvKeyFilter

  keySeparator?: string
  prefixSeparator?: string
  tryParsing?: boolean
  listSeparator?: string
  listParseKeys?: Iterable<string>
}

/**
 * Builds a SafeEnvSource from a plain options object, throwing the
 * ConfigError of a failed construction.
 */
export function createSafeEnvSource(
  init: SafeEnvSourceInit,
  deps: SafeEnvSourceDeps = {},
): SafeEnvSource {
  const result = SafeEnvSource.withPrefixAndFilter(init.prefix, init.filter ?? (() => true), deps)
  if (!result.ok) throw result.error

  let source = result.value

  if (init.keySeparator !== undefined) source = source.keySeparator(init.keySeparator)
  if (init.prefixSeparator !== undefined) source = source.prefixSeparator(init.prefixSeparator)
  if (init.tryParsing !== undefined) source = source.tryParsing(init.tryParsing)
  if (init.listSeparator !== undefined) source = source.listSeparator(init.listSeparator)

  for (const key of init.listParseKeys ?? []) {
    source = source.withListParseKey(key)
  }

  return source
}
