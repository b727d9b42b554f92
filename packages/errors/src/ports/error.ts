/** Lower-case snake_case, e.g. `"config_source_failed"`. */
export type ErrorCode = Lowercase<string>

/**
 * Data a handler may branch on: source names, file paths, validation issues.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

/**
 * What an application error adds to `Error`. The underlying failure, such as
 * the `ENOENT` behind an unreadable `.env` file, stays on `Error.cause`.
 */
export type AppErrorFields<C extends ErrorCode = ErrorCode> = {
  readonly code: C
  readonly context: ErrorContext

  /** A source that may read fine on the next attempt */
  readonly isRetryable: boolean

  /**
   * `true` for bad input or environment (missing file, rejected schema),
   * `false` for bugs and values thrown that were not errors.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date
}

export interface AppError<C extends ErrorCode = ErrorCode> extends Error, AppErrorFields<C> {}

/**
 * Plain-data form of any thrown value, for log lines. Safe to
 * `JSON.stringify` when the context values are.
 */
export type SerializedError = Readonly<
  Pick<AppErrorFields, "isOperational"> & {
    name: string
    code: string
    message: string
    context: Record<string, unknown>
    timestamp: string
    cause?: SerializedError
    stack?: string
  }
>
