export type HttpMethod = "POST"

export type HttpRequest = {
  method: HttpMethod
  url: URL
  headers: Readonly<Record<string, string>>
  body: Uint8Array
}

export type HttpResponse = {
  status: number
}

/**
 * Minimal HTTP capability used for delivery.
 *
 * Implementations resolve once the status line is known and reject on
 * connection, TLS or DNS failures. When `signal` aborts, the pending call
 * should reject and release whatever it holds.
 */
export interface HttpClient {
  send(request: HttpRequest, signal: AbortSignal): Promise<HttpResponse>
}
