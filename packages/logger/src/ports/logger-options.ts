import type { LogLevelName } from "./log-level"

/**
 * How much a logger writes and in what form. Every adapter honours both.
 */
export type LoggerOptions = {
  /** Lowest level written; `"info"` drops trace and debug lines. */
  level: LogLevelName

  /** Human-readable lines for local runs instead of JSON. */
  prettify?: boolean
}
