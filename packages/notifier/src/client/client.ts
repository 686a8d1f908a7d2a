import { SystemClock } from "../adapters/clock/system-clock"
import { FetchHttpClient } from "../adapters/fetch/fetch-http-client"
import { ProcessHost } from "../adapters/host/process-host"
import { NullLogger } from "../adapters/logger/null-logger"
import { deliver } from "../core/delivery/deliver"
import { normalizeError } from "../core/normalize/normalize-error"
import { buildPayload, safeNowMs } from "../core/notice/build-notice"
import { buildRequest } from "../core/notice/build-request"
import { userAgent } from "../core/notice/user-agent"
import { DeliveryError } from "../errors/delivery-error"
import { TransportInitError } from "../errors/notifier-errors"
import type { ClientConfig } from "../ports/client-config"
import type { Clock } from "../ports/clock"
import type { DeliveryOutcome } from "../ports/delivery-outcome"
import type { Host } from "../ports/host"
import type { HttpClient } from "../ports/http-client"
import type { Logger } from "../ports/logger"
import type { NoticeContext } from "../ports/notice"

const SUPPORTED_PROTOCOLS = new Set(["http:", "https:"])

export type ClientDeps = {
  /** @default FetchHttpClient */
  httpClient?: HttpClient
  /** @default SystemClock */
  clock?: Clock
  /** @default ProcessHost */
  host?: Host
  /** @default NullLogger */
  logger?: Logger
}

/**
 * Reports errors to the notices endpoint, one request per call.
 *
 * Holds no mutable state after construction, so a single instance can be
 * shared by concurrent callers.
 *
 * @example
 * ```ts
 * const client = new Client(new ConfigBuilder("test-key").build())
 *
 * try {
 *   await work()
 * } catch (err) {
 *   await client.notify(err, { requestId: "req-1" })
 * }
 * ```
 */
export class Client {
  readonly config: ClientConfig
  readonly userAgent: string

  private readonly httpClient: HttpClient
  private readonly clock: Clock
  private readonly host: Host
  private readonly logger: Logger

  /** @throws TransportInitError when the transport cannot be set up */
  constructor(config: ClientConfig, deps: ClientDeps = {}) {
    if (!SUPPORTED_PROTOCOLS.has(config.endpoint.protocol)) {
      throw new TransportInitError(
        `Unsupported endpoint protocol: ${config.endpoint.protocol}`,
        { context: { endpoint: config.endpoint.href } },
      )
    }

    this.config = Object.freeze({ ...config })
    this.httpClient = deps.httpClient ?? new FetchHttpClient()
    this.clock = deps.clock ?? new SystemClock()
    this.host = deps.host ?? new ProcessHost()
    this.logger = (deps.logger ?? new NullLogger()).child({
      module: "notifier",
      endpoint: config.endpoint.href,
    })
    this.userAgent = userAgent(this.host)

    this.logger.debug("Constructed notifier client", {
      config: { ...config, apiKey: "[redacted]", endpoint: config.endpoint.href },
      userAgent: this.userAgent,
    })
  }

  /**
   * Send one notice and return how the endpoint answered.
   *
   * Only serialization problems reject (`SerializationError`); every
   * delivery result, failures included, resolves as an outcome.
   */
  async report(error: unknown, context?: NoticeContext | null): Promise<DeliveryOutcome> {
    const record = normalizeError(error)
    const body = buildPayload(this.config, record, context, {
      clock: this.clock,
      host: this.host,
    })
    const request = buildRequest(this.config, this.userAgent, body)

    const startedAt = safeNowMs(this.clock)
    const outcome = await deliver(this.httpClient, request, this.config.timeout, {
      clock: this.clock,
    })
    const finishedAt = safeNowMs(this.clock)

    this.logger.debug("Notice delivery finished", {
      outcome: outcome.kind,
      ...("status" in outcome && { status: outcome.status }),
      ...(startedAt !== undefined &&
        finishedAt !== undefined && { durationMs: finishedAt - startedAt }),
    })

    return outcome
  }

  /**
   * Send one notice; resolves only when the endpoint accepted it.
   *
   * @throws DeliveryError for every other outcome, with `outcome` attached
   * @throws SerializationError when the notice cannot be encoded
   */
  async notify(error: unknown, context?: NoticeContext | null): Promise<void> {
    const outcome = await this.report(error, context)

    if (outcome.kind !== "success") throw new DeliveryError(outcome)
  }
}
