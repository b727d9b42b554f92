export const ENVIRONMENT_ORIGIN = "the environment"
export const DEFAULT_KEY_SEPARATOR = "__"
export const DEFAULT_PREFIX_SEPARATOR = "_"
export const DEFAULT_LIST_SEPARATOR = ","

/**
 * How a safe environment source turns its snapshot into typed values.
 */
export type SafeEnvOptions = Readonly<{
  /** Variable name prefix, without the trailing underscore */
  prefix: string

  /**
   * Replaced by `.` in keys to form nested paths. Empty disables nesting.
   * @default "__"
   */
  keySeparator: string

  /**
   * Follows the prefix in variable names and is stripped with it.
   * @default "_"
   */
  prefixSeparator: string

  /**
   * Infer booleans, integers, floats and lists. When off every value is a string.
   * @default true
   */
  tryParsing: boolean

  /**
   * Splits values of the keys in `listParseKeys`.
   *
   * Empty disables list parsing, the same as unset. It never splits a value
   * into single characters.
   * @default ","
   */
  listSeparator: string | undefined

  /**
   * Processed key paths (`"server.hosts"`) whose values are split into lists.
   * Unset means no key is.
   */
  listParseKeys: ReadonlySet<string> | undefined

  /**
   * Provenance tag on every produced value, also the source name.
   * @default "the environment"
   */
  origin: string
}>

export function defaultSafeEnvOptions(prefix: string, origin = ENVIRONMENT_ORIGIN): SafeEnvOptions {
  return Object.freeze({
    prefix,
    keySeparator: DEFAULT_KEY_SEPARATOR,
    prefixSeparator: DEFAULT_PREFIX_SEPARATOR,
    tryParsing: true,
    listSeparator: DEFAULT_LIST_SEPARATOR,
    listParseKeys: undefined,
    origin,
  })
}
