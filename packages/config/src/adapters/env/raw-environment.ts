/**
 * An environment key or value as the platform hands it over. Bytes carry no
 * encoding guarantee; strings may already hold decoding damage.
 */
export type RawOsString = string | Uint8Array

export type RawEnvironmentEntry = readonly [key: RawOsString, value: RawOsString]

/**
 * Returns every raw entry of an environment in one pass.
 */
export type RawEnvironmentReader = () => Iterable<RawEnvironmentEntry>

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/

// Node substitutes U+FFFD for environment bytes that are not valid UTF-8.
const REPLACEMENT_CHARACTER = "\uFFFD"

/**
 * Lossless conversion to text, or `undefined` when the input is not valid
 * Unicode.
 *
 * Byte input must be well-formed UTF-8. String input must be free of lone
 * surrogates and of U+FFFD, since a string read from `process.env` cannot tell
 * a real replacement character from one left by a failed decode.
 */
export function toUnicode(raw: RawOsString): string | undefined {
  if (typeof raw === "string") {
    if (LONE_SURROGATE.test(raw) || raw.includes(REPLACEMENT_CHARACTER)) return undefined

    return raw
  }

  try {
    return utf8.decode(raw)
  } catch {
    return undefined
  }
}

/**
 * Copies the environment in a single enumeration. The JS thread cannot be
 * interleaved with a mutation while the copy runs.
 */
export function readProcessEnvironment(
  env: NodeJS.ProcessEnv = process.env,
): RawEnvironmentEntry[] {
  const entries: RawEnvironmentEntry[] = []

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) entries.push([key, value])
  }

  return entries
}

export const processEnvironmentReader: RawEnvironmentReader = () => readProcessEnvironment()
