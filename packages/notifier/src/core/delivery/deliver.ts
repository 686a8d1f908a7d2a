import { SystemClock } from "../../adapters/clock/system-clock"
import type { Sleeper } from "../../ports/clock"
import type { DeliveryOutcome } from "../../ports/delivery-outcome"
import type { HttpClient, HttpRequest } from "../../ports/http-client"
import type { Milliseconds, Seconds } from "../../ports/time"
import { classifyStatus } from "./classify-status"

export type DeliverDeps = {
  clock: Sleeper
}

/** Largest delay a Node timer honours; longer ones fire after 1 ms. */
export const MAX_TIMER_DELAY_MS: Milliseconds = 2_147_483_647

type Settled =
  | { kind: "response"; status: number }
  | { kind: "failed"; cause: unknown }
  | { kind: "deadline" }

/**
 * Send one request and classify what comes back, giving up after `timeout`.
 *
 * @remarks
 * The request races the clock. When the deadline wins the request is
 * aborted and `timed_out` is returned without waiting for it; the endpoint
 * may still have received the notice. Timeouts beyond the timer limit
 * (about 24.8 days) wait for the limit. A response that wins is always
 * classified. The body is never read.
 */
export async function deliver(
  httpClient: HttpClient,
  request: HttpRequest,
  timeout: Seconds,
  deps: DeliverDeps = { clock: new SystemClock() },
): Promise<DeliveryOutcome> {
  const inflight = new AbortController()
  const timer = new AbortController()

  const response = attempt(() => httpClient.send(request, inflight.signal))
  const delay = Math.min(timeout * 1000, MAX_TIMER_DELAY_MS)
  const deadline = deps.clock.sleep(delay, timer.signal).then(expired, expired)

  try {
    const first = await Promise.race([response, deadline])

    switch (first.kind) {
      case "deadline":
        inflight.abort()
        return { kind: "timed_out", seconds: timeout }
      case "failed":
        return { kind: "transport_failed", cause: first.cause }
      case "response":
        return classifyStatus(first.status)
    }
  } finally {
    timer.abort()
  }
}

function expired(): Settled {
  return { kind: "deadline" }
}

async function attempt(send: () => Promise<{ status: number }>): Promise<Settled> {
  try {
    const res = await send()
    return { kind: "response", status: res.status }
  } catch (cause) {
    return { kind: "failed", cause }
  }
}
