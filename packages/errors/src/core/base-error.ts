import type { AppError, AppErrorFields, ErrorCode, SerializedError } from "../ports/error"
import { serializeError } from "./serialize-error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<
  Pick<AppErrorFields<C>, "code"> &
    Partial<Pick<AppErrorFields<C>, "context" | "isRetryable" | "isOperational">> & {
      cause?: unknown
    }
>

/**
 * Error with a machine-readable code and frozen context. Each package
 * subclasses it with its own union of codes:
 *
 * @example
 * ```ts
 * class ConfigError extends BaseError<"config_source_failed" | "config_validation_failed"> {}
 * ```
 */
export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError<C> {
  readonly code: C
  readonly context: AppErrorFields["context"]
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp = new Date()

  constructor(
    message: string,
    { code, context = {}, cause, isRetryable = false, isOperational = true }: BaseErrorOptions<C>,
  ) {
    super(message, cause === undefined ? undefined : { cause })

    this.name = new.target.name
    this.code = code
    this.context = Object.freeze({ ...context })
    this.isRetryable = isRetryable
    this.isOperational = isOperational

    Error.captureStackTrace?.(this, new.target)
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}
