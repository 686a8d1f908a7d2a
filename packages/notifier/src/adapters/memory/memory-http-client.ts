import type { HttpClient, HttpRequest, HttpResponse } from "../../ports/http-client"

/** What the stand-in does with one request. */
export type MemoryReply =
  | { kind: "status"; status: number }
  | { kind: "fail"; error: unknown }
  | { kind: "hang" }

export type MemoryHttpClientOptions = {
  /** Reply used when the queue is empty. @default { kind: "status", status: 201 } */
  fallback?: MemoryReply
}

/**
 * In-process HttpClient that records requests and answers from a queue.
 *
 * A `hang` reply never settles on its own; it rejects once the caller's
 * signal aborts, as a real client would.
 */
export class MemoryHttpClient implements HttpClient {
  readonly requests: HttpRequest[] = []
  private readonly queue: MemoryReply[] = []
  private readonly fallback: MemoryReply
  private abortedCount = 0

  constructor(options: MemoryHttpClientOptions = {}) {
    this.fallback = options.fallback ?? { kind: "status", status: 201 }
  }

  /** Requests whose signal aborted while they were pending. */
  get aborted(): number {
    return this.abortedCount
  }

  enqueue(...replies: MemoryReply[]): this {
    this.queue.push(...replies)
    return this
  }

  async send(request: HttpRequest, signal: AbortSignal): Promise<HttpResponse> {
    this.requests.push(request)

    const reply = this.queue.shift() ?? this.fallback

    switch (reply.kind) {
      case "status":
        return { status: reply.status }
      case "fail":
        throw reply.error
      case "hang":
        return await this.hang(signal)
    }
  }

  /** Decoded JSON body of the n-th recorded request. */
  body(index = 0): unknown {
    const request = this.requests[index]
    if (!request) throw new Error(`No request recorded at index ${index}`)

    return JSON.parse(new TextDecoder().decode(request.body))
  }

  private hang(signal: AbortSignal): Promise<never> {
    return new Promise((_, reject) => {
      const onAbort = () => {
        this.abortedCount += 1
        reject(signal.reason)
      }

      if (signal.aborted) return onAbort()

      signal.addEventListener("abort", onAbort, { once: true })
    })
  }
}
