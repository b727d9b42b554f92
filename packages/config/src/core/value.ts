import type { ConfigValue, ValueMap } from "../ports/value"

export const PATH_DELIMITER = "."

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER)
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER)

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false

  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}

/**
 * Plain JS value of a typed value. Integers become numbers when they fit
 * losslessly, and stay bigints otherwise.
 */
export function unwrapValue(value: ConfigValue): unknown {
  switch (value.kind) {
    case "integer":
      return value.value >= MIN_SAFE && value.value <= MAX_SAFE
        ? Number(value.value)
        : value.value
    case "array":
      return value.value.map(unwrapValue)
    default:
      return value.value
  }
}

// Own data property, so a "__proto__" segment can never reach the prototype.
function defineOwn(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  })
}

/**
 * Sets `value` at `segments` inside `target`, creating (or replacing
 * non-object values with) intermediate objects.
 */
export function setPath(
  target: Record<string, unknown>,
  segments: readonly string[],
  value: unknown,
): void {
  const leaf = segments.at(-1)
  if (leaf === undefined) return

  let node = target

  for (const segment of segments.slice(0, -1)) {
    const existing = Object.hasOwn(node, segment) ? node[segment] : undefined

    if (isPlainObject(existing)) {
      node = existing
      continue
    }

    const child: Record<string, unknown> = {}
    defineOwn(node, segment, child)
    node = child
  }

  defineOwn(node, leaf, value)
}

/**
 * Expands dotted keys into nested plain objects. When paths conflict
 * (`"a"` and `"a.b"`), the later entry wins.
 */
export function expandPaths(entries: Iterable<readonly [string, unknown]>): Record<string, unknown> {
  const out: Record<string, unknown> = {}

  for (const [path, value] of entries) {
    setPath(out, path.split(PATH_DELIMITER), value)
  }

  return out
}

export function toPlainObject(values: ValueMap): Record<string, unknown> {
  const entries: [string, unknown][] = []

  for (const [path, value] of values) {
    entries.push([path, unwrapValue(value)])
  }

  return expandPaths(entries)
}

/**
 * Walks nested plain objects and yields the path segments and value of every
 * leaf. Arrays, class instances and empty objects are leaves.
 */
export function* flattenLeaves(
  value: Record<string, unknown>,
  parents: readonly string[] = [],
): Generator<[segments: string[], value: unknown]> {
  for (const [key, child] of Object.entries(value)) {
    const segments = [...parents, key]

    if (isPlainObject(child) && Object.keys(child).length > 0) {
      yield* flattenLeaves(child, segments)
    } else {
      yield [segments, child]
    }
  }
}

export function deepFreeze<T>(value: T): T {
  if (Array.isArray(value) || isPlainObject(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }

  return value
}
