import { type RawEnvironmentEntry, toUnicode } from "./raw-environment"

/**
 * Decides, from the part of a key after `"<prefix>_"`, whether an entry is
 * kept.
 */
export type EnvKeyFilter = (suffix: string) => boolean

/**
 * Original-case key to value, captured once.
 */
export type RawEnvironmentSnapshot = ReadonlyMap<string, string>

export type SnapshotDropReason = "nonUnicodeKey" | "missingPrefix" | "rejected" | "nonUnicodeValue"

export type SnapshotStats = Readonly<{
  entries: number
  kept: number
  dropped: Readonly<Record<SnapshotDropReason, number>>
}>

export type Snapshot = Readonly<{
  snapshot: RawEnvironmentSnapshot
  stats: SnapshotStats
}>

/**
 * Filters raw entries down to the Unicode-safe ones whose key starts with
 * `"<prefix>_"` and whose suffix passes `filter`.
 *
 * Entries that fail a check are dropped and counted, never reported as errors.
 * An exception thrown by `filter` propagates.
 */
export function snapshotEnvironment(
  prefix: string,
  filter: EnvKeyFilter,
  entries: Iterable<RawEnvironmentEntry>,
): Snapshot {
  const keyPrefix = `${prefix}_`
  const snapshot = new Map<string, string>()
  const dropped: Record<SnapshotDropReason, number> = {
    nonUnicodeKey: 0,
    missingPrefix: 0,
    rejected: 0,
    nonUnicodeValue: 0,
  }
  let total = 0

  for (const [rawKey, rawValue] of entries) {
    total++

    const key = toUnicode(rawKey)
    if (key === undefined) {
      dropped.nonUnicodeKey++
      continue
    }

    if (!key.startsWith(keyPrefix)) {
      dropped.missingPrefix++
      continue
    }

    if (!filter(key.slice(keyPrefix.length))) {
      dropped.rejected++
      continue
    }

    const value = toUnicode(rawValue)
    if (value === undefined) {
      dropped.nonUnicodeValue++
      continue
    }

    snapshot.set(key, value)
  }

  return {
    snapshot,
    stats: { entries: total, kept: snapshot.size, dropped },
  }
}
