import { TransportInitError } from "../../errors/notifier-errors"
import type { HttpClient, HttpRequest, HttpResponse } from "../../ports/http-client"

export type FetchHttpClientDeps = {
  /** @default globalThis.fetch */
  fetch?: typeof fetch
}

/**
 * HttpClient backed by the WHATWG `fetch` shipped with Node.
 *
 * Redirects are not followed so that a 3xx reaches the classifier, and the
 * response body is cancelled unread.
 */
export class FetchHttpClient implements HttpClient {
  private readonly fetch: typeof fetch

  constructor(deps: FetchHttpClientDeps = {}) {
    const impl = deps.fetch ?? globalThis.fetch

    if (typeof impl !== "function") {
      throw new TransportInitError("No fetch implementation is available")
    }

    this.fetch = impl
  }

  async send(request: HttpRequest, signal: AbortSignal): Promise<HttpResponse> {
    const res = await this.fetch(request.url, {
      method: request.method,
      headers: { ...request.headers },
      body: request.body,
      redirect: "manual",
      signal,
    })

    await res.body?.cancel()

    return { status: res.status }
  }
}
