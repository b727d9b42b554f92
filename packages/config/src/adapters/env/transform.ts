import { PATH_DELIMITER } from "../../core/value"
import type { ValueMap } from "../../ports/value"
import { inferValue } from "./infer-value"
import type { SafeEnvOptions } from "./safe-env-options"
import type { RawEnvironmentSnapshot } from "./snapshot"

/**
 * Lower-cases a raw key, strips `prefix + prefixSeparator` and turns every
 * key separator into a path delimiter: `APP_SERVER__PORT` → `server.port`.
 */
export function processKey(
  rawKey: string,
  options: Pick<SafeEnvOptions, "prefix" | "prefixSeparator" | "keySeparator">,
): string {
  let key = rawKey.toLowerCase()

  const prefixPattern = `${options.prefix.toLowerCase()}${options.prefixSeparator}`
  if (key.startsWith(prefixPattern)) {
    key = key.slice(prefixPattern.length)
  }

  if (options.keySeparator !== "") {
    key = key.split(options.keySeparator).join(PATH_DELIMITER)
  }

  return key
}

function compareKeys([a]: readonly [string, string], [b]: readonly [string, string]): number {
  if (a < b) return -1
  return a > b ? 1 : 0
}

/**
 * Produces a fresh map of key path to typed value. Pure: the same snapshot
 * and options always give an equal map.
 *
 * Entries are visited in ascending raw key order, so of two raw keys that
 * normalize to one path the later one wins.
 */
export function transformSnapshot(
  snapshot: RawEnvironmentSnapshot,
  options: SafeEnvOptions,
): ValueMap {
  const values: ValueMap = new Map()

  for (const [rawKey, rawValue] of [...snapshot].sort(compareKeys)) {
    const key = processKey(rawKey, options)

    values.set(key, inferValue(rawValue, key, options))
  }

  return values
}
