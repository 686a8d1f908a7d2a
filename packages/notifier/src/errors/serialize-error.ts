import type { AppError, SerializedError } from "../ports/error"

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

function isAppError(err: Error): err is AppError {
  const candidate: Partial<Record<keyof AppError, unknown>> = err

  return (
    typeof candidate.code === "string" &&
    typeof candidate.context === "object" &&
    candidate.context !== null &&
    typeof candidate.isOperational === "boolean" &&
    candidate.timestamp instanceof Date
  )
}

/**
 * Serialize any error (or thrown value) to a consistent, JSON-safe shape.
 *
 * - AppError instances keep their code, context and timestamp
 * - Other errors get code "unknown" and `isOperational: false`
 * - Non-error values are wrapped as `NonErrorThrown`
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof Error && isAppError(err)) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
