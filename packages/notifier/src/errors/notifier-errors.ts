import type { ErrorContext } from "../ports/error"
import { BaseError } from "./base-error"

/**
 * The notice could not be encoded. Indicates a caller bug such as a
 * non-string context value; it is never retried.
 */
export class SerializationError extends BaseError<"serialization_failed"> {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super(message, { ...options, code: "serialization_failed", isOperational: false })
  }
}

/** The HTTP transport could not be set up. Fatal until reconfigured. */
export class TransportInitError extends BaseError<"transport_init_failed"> {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super(message, { ...options, code: "transport_init_failed" })
  }
}

export class ConfigError extends BaseError<"invalid_config"> {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super(message, { ...options, code: "invalid_config" })
  }
}
