import type { AppError } from "@envlayer/errors"
import type { ConfigResult } from "./result"
import type { ValueMap } from "./value"

/**
 * A source of configuration values.
 *
 * A ConfigSource is responsible only for *loading* configuration.
 * Merging and validation happen in `loadConfig`.
 *
 * Sources are evaluated in order; later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "the environment", "dotenv:.env", "object:overrides"
   */
  readonly name: string

  /**
   * Load configuration values as a plain object.
   *
   * - Nested objects are merged leaf by leaf with other sources
   * - Returning undefined for a key means "value not provided"
   * - Zod handles coercion and validation downstream
   */
  load(): Promise<Record<string, unknown>>
}

/**
 * A source that produces typed values keyed by dotted path.
 */
export interface ValueSource {
  /** Independent copy that produces the same values. */
  clone(): ValueSource

  /**
   * Collect every value of this source. The map is owned by the caller.
   */
  collect(): ConfigResult<ValueMap, AppError>
}
