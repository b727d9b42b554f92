export type LogContext = {
  service: string
  module: string
  env: string

  /** Name of the configuration source a log line is about */
  source: string
}

export type LogOutcome = {
  durationMs: number

  /**
   * Named counters, e.g. entries kept and dropped while taking an environment
   * snapshot. Only counts: keys and values are never logged.
   */
  counts: Readonly<Record<string, number>>
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogOutcome> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context by child().
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
