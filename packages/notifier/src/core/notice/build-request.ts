import type { ClientConfig } from "../../ports/client-config"
import type { HttpRequest } from "../../ports/http-client"

export function buildRequest(
  config: ClientConfig,
  userAgent: string,
  body: Uint8Array,
): HttpRequest {
  return {
    method: "POST",
    url: config.endpoint,
    headers: {
      Accept: "application/json",
      "Content-Type": "application/json",
      "X-API-Key": config.apiKey,
      "User-Agent": userAgent,
    },
    body,
  }
}
