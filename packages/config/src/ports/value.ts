type Tagged<K extends string, V> = Readonly<{
  kind: K
  value: V

  /** Where the value came from, e.g. "the environment" or "dotenv:.env" */
  origin: string
}>

/**
 * A typed configuration value.
 *
 * Integers are signed 64-bit and kept as `bigint` so that no environment
 * value is rounded on the way in.
 */
export type ConfigValue =
  | Tagged<"boolean", boolean>
  | Tagged<"integer", bigint>
  | Tagged<"float", number>
  | Tagged<"string", string>
  | Tagged<"array", readonly ConfigValue[]>

export type ValueKind = ConfigValue["kind"]

/**
 * Dotted key path (`"server.port"`) to typed value.
 */
export type ValueMap = Map<string, ConfigValue>
