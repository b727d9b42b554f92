import type { SerializedError } from "../ports/error"
import { isAppError } from "./utils/is-app-error"

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any thrown value to a consistent shape.
 *
 * - AppErrors keep their code, context and operational flag
 * - Other Errors get code "unknown" and are treated as non-operational
 * - Non-Error values are wrapped, with the value under `context.value`
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof Error) {
    const app = isAppError(err)
    const cause: unknown = err.cause

    return {
      name: err.name,
      code: app ? err.code : "unknown",
      message: err.message,
      context: app ? { ...err.context } : {},
      isOperational: app ? err.isOperational : false,
      timestamp: (app ? err.timestamp : new Date()).toISOString(),
      ...(cause !== undefined ? { cause: serializeError(cause, options) } : {}),
      ...(includeStack && err.stack ? { stack: err.stack } : {}),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
