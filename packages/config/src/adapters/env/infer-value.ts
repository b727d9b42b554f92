import type { ConfigValue } from "../../ports/value"
import type { SafeEnvOptions } from "./safe-env-options"

const I64_MIN = -(2n ** 63n)
const I64_MAX = 2n ** 63n - 1n

const INTEGER = /^[+-]?\d+$/
const FLOAT = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?|inf|infinity|nan)$/i

export function parseBoolean(raw: string): boolean | undefined {
  switch (raw.toLowerCase()) {
    case "true":
      return true
    case "false":
      return false
    default:
      return undefined
  }
}

/** Signed 64-bit decimal integer, optional sign, no whitespace. */
export function parseInteger(raw: string): bigint | undefined {
  if (!INTEGER.test(raw)) return undefined

  const value = BigInt(raw)

  return value >= I64_MIN && value <= I64_MAX ? value : undefined
}

/**
 * Decimal float with optional fraction and exponent, or inf / infinity / nan
 * in any case. Unlike `Number()`, rejects blanks, hex and surrounding space.
 */
export function parseFloat64(raw: string): number | undefined {
  if (!FLOAT.test(raw)) return undefined

  const negative = raw.startsWith("-")
  const body = raw.replace(/^[+-]/, "").toLowerCase()

  if (body === "nan") return Number.NaN
  if (body === "inf" || body === "infinity") {
    return negative ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY
  }

  return Number(raw)
}

export type InferOptions = Pick<
  SafeEnvOptions,
  "tryParsing" | "listSeparator" | "listParseKeys" | "origin"
>

/**
 * Types a raw value, trying boolean, integer, float and then list before
 * settling on the unmodified string. `key` is the processed key path, which
 * decides list membership.
 */
export function inferValue(raw: string, key: string, options: InferOptions): ConfigValue {
  const { origin } = options

  if (!options.tryParsing) return { kind: "string", value: raw, origin }

  const bool = parseBoolean(raw)
  if (bool !== undefined) return { kind: "boolean", value: bool, origin }

  const int = parseInteger(raw)
  if (int !== undefined) return { kind: "integer", value: int, origin }

  const float = parseFloat64(raw)
  if (float !== undefined) return { kind: "float", value: float, origin }

  const separator = options.listSeparator
  if (separator && options.listParseKeys?.has(key)) {
    return {
      kind: "array",
      value: raw
        .split(separator)
        .map((item): ConfigValue => ({ kind: "string", value: item, origin })),
      origin,
    }
  }

  return { kind: "string", value: raw, origin }
}
