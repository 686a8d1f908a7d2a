import type { DeliveryOutcomeKind, FailedOutcome } from "../ports/delivery-outcome"
import { BaseError } from "./base-error"

export type DeliveryErrorCode = Exclude<DeliveryOutcomeKind, "success">

const RETRYABLE: Readonly<Record<DeliveryErrorCode, boolean>> = {
  redirected: false,
  unauthorized: false,
  unprocessable: false,
  unknown_status: false,
  rate_limited: true,
  server_error: true,
  timed_out: true,
  transport_failed: true,
}

/**
 * A notice that did not reach the endpoint, or was refused by it.
 *
 * The client never retries on its own; `isRetryable` is a hint for callers.
 */
export class DeliveryError extends BaseError<DeliveryErrorCode> {
  readonly outcome: FailedOutcome

  constructor(outcome: FailedOutcome) {
    super(describe(outcome), {
      code: outcome.kind,
      context: outcomeContext(outcome),
      isRetryable: RETRYABLE[outcome.kind],
      ...(outcome.kind === "transport_failed" && { cause: outcome.cause }),
    })

    this.outcome = outcome
  }
}

function describe(outcome: FailedOutcome): string {
  switch (outcome.kind) {
    case "redirected":
      return "The endpoint replied with a redirect"
    case "unauthorized":
      return "API key is incorrect or the account is deactivated"
    case "unprocessable":
      return "The payload couldn't be processed"
    case "rate_limited":
      return "Notice rate limit exceeded"
    case "server_error":
      return "The endpoint replied with '500 Internal Server Error'"
    case "unknown_status":
      return `The endpoint responded with an unknown status code: ${outcome.status}`
    case "timed_out":
      return `Delivery timed out after ${outcome.seconds} seconds`
    case "transport_failed":
      return "The request could not be sent"
  }
}

function outcomeContext(outcome: FailedOutcome): Record<string, unknown> {
  if (outcome.kind === "timed_out") return { seconds: outcome.seconds }
  if (outcome.kind === "transport_failed") return {}

  return { status: outcome.status }
}
