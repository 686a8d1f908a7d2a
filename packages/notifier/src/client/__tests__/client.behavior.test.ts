import { mock } from "vitest-mock-extended"
import { FakeClock } from "../../adapters/clock/fake-clock"
import { StaticHost } from "../../adapters/host/static-host"
import { MemoryHttpClient } from "../../adapters/memory/memory-http-client"
import { DeliveryError } from "../../errors/delivery-error"
import { SerializationError, TransportInitError } from "../../errors/notifier-errors"
import type { ClientConfig } from "../../ports/client-config"
import type { Logger } from "../../ports/logger"
import type { NoticeContext } from "../../ports/notice"
import { Client } from "../client"

const config: ClientConfig = {
  apiKey: "test-key",
  projectRoot: "/srv/app",
  environmentName: "test",
  hostname: "box-1",
  endpoint: new URL("https://notices.example.test/v1/notices"),
  timeout: 5,
}

function makeClient(overrides: Partial<ClientConfig> = {}) {
  const http = new MemoryHttpClient()
  const clock = new FakeClock(1_700_000_000_000)
  const host = new StaticHost({
    env: { NODE_ENV: "test" },
    pid: 4242,
    platform: { type: "Linux", release: "6.1.0" },
  })
  const client = new Client({ ...config, ...overrides }, { httpClient: http, clock, host })

  return { client, http, clock }
}

describe("Client", () => {
  describe("construction", () => {
    it("computes the user agent once", () => {
      const { client } = makeClient()

      expect(client.userAgent).toBe("tattletale 0.1.0; Linux/6.1.0")
    })

    it("freezes its own copy of the config", () => {
      const { client } = makeClient()

      expect(Object.isFrozen(client.config)).toBe(true)
      expect(client.config).toEqual(config)
    })

    it("rejects endpoints that are not http or https", () => {
      expect(() => makeClient({ endpoint: new URL("ftp://notices.example.test/") })).toThrow(
        TransportInitError,
      )
    })

    it("accepts plain http endpoints", () => {
      expect(() => makeClient({ endpoint: new URL("http://127.0.0.1:8080/notices") })).not.toThrow()
    })

    it("logs its config without the API key", () => {
      const logger = mock<Logger>()
      const child = mock<Logger>()
      logger.child.mockReturnValue(child)

      new Client(config, { httpClient: new MemoryHttpClient(), logger })

      expect(logger.child).toHaveBeenCalledWith({
        module: "notifier",
        endpoint: "https://notices.example.test/v1/notices",
      })
      expect(child.debug).toHaveBeenCalledWith(
        "Constructed notifier client",
        expect.objectContaining({
          config: expect.objectContaining({ apiKey: "[redacted]" }),
        }),
      )
    })
  })

  describe("notify", () => {
    it("resolves when the endpoint accepts the notice", async () => {
      const { client, http } = makeClient()

      await expect(client.notify(new Error("boom"))).resolves.toBeUndefined()
      expect(http.requests).toHaveLength(1)
    })

    it("sends the notice headers", async () => {
      const { client, http } = makeClient()

      await client.notify(new Error("boom"))

      expect(http.requests[0]?.headers).toEqual({
        Accept: "application/json",
        "Content-Type": "application/json",
        "X-API-Key": "test-key",
        "User-Agent": "tattletale 0.1.0; Linux/6.1.0",
      })
      expect(http.requests[0]?.url.href).toBe("https://notices.example.test/v1/notices")
    })

    it("sends the normalized error with context and server facts", async () => {
      const { client, http } = makeClient()

      await client.notify(new Error("save failed", { cause: new Error("disk full") }), {
        requestId: "req-1",
      })

      expect(http.body()).toMatchObject({
        api_key: "test-key",
        error: {
          class: "Error",
          message: "Error: save failed\nCaused by: Error: disk full",
        },
        request: {
          context: { requestId: "req-1" },
          cgi_data: { NODE_ENV: "test" },
        },
        server: {
          project_root: "/srv/app",
          environment_name: "test",
          hostname: "box-1",
          time: 1_700_000_000,
          pid: 4242,
        },
      })
    })

    it.each([
      [301, "redirected", false],
      [401, "unauthorized", false],
      [422, "unprocessable", false],
      [429, "rate_limited", true],
      [500, "server_error", true],
      [418, "unknown_status", false],
    ])("rejects a %i reply with a %s DeliveryError", async (status, code, retryable) => {
      const { client, http } = makeClient()
      http.enqueue({ kind: "status", status })

      const err = await client.notify("boom").catch((e: unknown) => e)

      expect(err).toBeInstanceOf(DeliveryError)
      expect(err).toMatchObject({
        code,
        isRetryable: retryable,
        outcome: { kind: code, status },
      })
    })

    it("rejects a transport failure with its cause attached", async () => {
      const { client, http } = makeClient()
      const cause = new TypeError("fetch failed")
      http.enqueue({ kind: "fail", error: cause })

      const err = await client.notify("boom").catch((e: unknown) => e)

      expect(err).toBeInstanceOf(DeliveryError)
      expect(err).toMatchObject({ code: "transport_failed", cause })
    })

    it("rejects with timed_out when the endpoint never answers", async () => {
      const { client, http, clock } = makeClient({ timeout: 2 })
      http.enqueue({ kind: "hang" })

      const pending = client.notify("boom").catch((e: unknown) => e)
      await vi.waitFor(() => expect(clock.pendingSleeps).toBe(1))
      clock.advance(2_000)

      const err = await pending
      expect(err).toBeInstanceOf(DeliveryError)
      expect(err).toMatchObject({ code: "timed_out", outcome: { kind: "timed_out", seconds: 2 } })
      expect(http.aborted).toBe(1)
    })

    it("rejects a context that is not a string map before sending", async () => {
      const { client, http } = makeClient()
      const context = { attempt: 3 } as unknown as NoticeContext

      await expect(client.notify("boom", context)).rejects.toThrow(SerializationError)
      expect(http.requests).toHaveLength(0)
    })

    it("delivers two calls independently", async () => {
      const { client, http } = makeClient()
      http.enqueue({ kind: "status", status: 500 }, { kind: "status", status: 201 })

      const [first, second] = await Promise.allSettled([
        client.notify(new Error("first")),
        client.notify(new Error("second")),
      ])

      expect(first.status).toBe("rejected")
      expect(second.status).toBe("fulfilled")
      expect(http.requests).toHaveLength(2)
      expect(http.body(0)).toMatchObject({ error: { message: "Error: first" } })
      expect(http.body(1)).toMatchObject({ error: { message: "Error: second" } })
    })
  })

  describe("clock failures", () => {
    const brokenClock = {
      nowMs(): number {
        throw new Error("clock unavailable")
      },
      sleep: (ms: number, signal?: AbortSignal) => new FakeClock().sleep(ms, signal),
    }

    it("still delivers when the clock throws", async () => {
      const http = new MemoryHttpClient()
      const client = new Client(config, { httpClient: http, clock: brokenClock })

      await expect(client.notify(new Error("x"))).resolves.toBeUndefined()
      expect(http.requests).toHaveLength(1)
      expect(http.body()).toMatchObject({ server: { time: 0 } })
    })

    it("logs the outcome without a duration", async () => {
      const logger = mock<Logger>()
      const child = mock<Logger>()
      logger.child.mockReturnValue(child)

      await new Client(config, {
        httpClient: new MemoryHttpClient(),
        clock: brokenClock,
        logger,
      }).report("boom")

      expect(child.debug).toHaveBeenLastCalledWith("Notice delivery finished", {
        outcome: "success",
        status: 201,
      })
    })
  })

  describe("report", () => {
    it("resolves every delivery result as an outcome", async () => {
      const { client, http } = makeClient()
      http.enqueue({ kind: "status", status: 201 }, { kind: "status", status: 401 })

      await expect(client.report("first")).resolves.toEqual({ kind: "success", status: 201 })
      await expect(client.report("second")).resolves.toEqual({
        kind: "unauthorized",
        status: 401,
      })
    })

    it("logs the outcome after delivery", async () => {
      const logger = mock<Logger>()
      const child = mock<Logger>()
      logger.child.mockReturnValue(child)
      const http = new MemoryHttpClient().enqueue({ kind: "status", status: 429 })

      await new Client(config, { httpClient: http, clock: new FakeClock(0), logger }).report(
        "boom",
      )

      expect(child.debug).toHaveBeenLastCalledWith("Notice delivery finished", {
        outcome: "rate_limited",
        status: 429,
        durationMs: 0,
      })
    })
  })
})
