import type { StatusOutcome } from "../../ports/delivery-outcome"

/**
 * Map an HTTP status to an outcome. First match wins: 2xx, 3xx, then 401,
 * 422, 429 and 500, then everything else as unknown.
 */
export function classifyStatus(status: number): StatusOutcome {
  if (status >= 200 && status < 300) return { kind: "success", status }
  if (status >= 300 && status < 400) return { kind: "redirected", status }

  switch (status) {
    case 401:
      return { kind: "unauthorized", status: 401 }
    case 422:
      return { kind: "unprocessable", status: 422 }
    case 429:
      return { kind: "rate_limited", status: 429 }
    case 500:
      return { kind: "server_error", status: 500 }
    default:
      return { kind: "unknown_status", status }
  }
}
