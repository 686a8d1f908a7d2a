import type { Seconds } from "./time"

export type Delivered = { readonly kind: "success"; readonly status: number }
export type Redirected = { readonly kind: "redirected"; readonly status: number }
export type Unauthorized = { readonly kind: "unauthorized"; readonly status: 401 }
export type Unprocessable = { readonly kind: "unprocessable"; readonly status: 422 }
export type RateLimited = { readonly kind: "rate_limited"; readonly status: 429 }
export type ServerFailure = { readonly kind: "server_error"; readonly status: 500 }
export type UnknownStatus = { readonly kind: "unknown_status"; readonly status: number }

export type TimedOut = {
  readonly kind: "timed_out"
  readonly seconds: Seconds
}

export type TransportFailed = {
  readonly kind: "transport_failed"
  readonly cause: unknown
}

export type StatusOutcome =
  | Delivered
  | Redirected
  | Unauthorized
  | Unprocessable
  | RateLimited
  | ServerFailure
  | UnknownStatus

/** Classified result of one delivery attempt. */
export type DeliveryOutcome = StatusOutcome | TimedOut | TransportFailed

export type DeliveryOutcomeKind = DeliveryOutcome["kind"]

export type FailedOutcome = Exclude<DeliveryOutcome, Delivered>
