import type { ReceivedRequest, TestReply } from "../../tests/utils/received-request"
import type { HttpClient, HttpRequest } from "../http-client"

export type HttpClientHarness = {
  name: string
  make: (...replies: TestReply[]) => Promise<{
    client: HttpClient
    url: URL
    received: () => ReceivedRequest[]
    close?: () => Promise<void>
  }>
}

function makeRequest(url: URL): HttpRequest {
  return {
    method: "POST",
    url,
    headers: {
      "Content-Type": "application/json",
      "X-API-Key": "test-key",
    },
    body: new TextEncoder().encode('{"probe":true}'),
  }
}

export function describeHttpClientContract(h: HttpClientHarness) {
  describe(`${h.name} (HttpClient contract)`, () => {
    it("sends the request and returns the status", async () => {
      const { client, url, received, close } = await h.make(201)

      try {
        const res = await client.send(makeRequest(url), new AbortController().signal)

        expect(res).toEqual({ status: 201 })
        expect(received()).toHaveLength(1)
        expect(received()[0]).toMatchObject({
          method: "POST",
          path: "/v1/notices",
          body: '{"probe":true}',
        })
        expect(received()[0]?.headers).toMatchObject({
          "content-type": "application/json",
          "x-api-key": "test-key",
        })
      } finally {
        await close?.()
      }
    })

    it("resolves error statuses instead of rejecting", async () => {
      const { client, url, close } = await h.make(500, 418)

      try {
        const signal = new AbortController().signal

        await expect(client.send(makeRequest(url), signal)).resolves.toEqual({ status: 500 })
        await expect(client.send(makeRequest(url), signal)).resolves.toEqual({ status: 418 })
      } finally {
        await close?.()
      }
    })

    it("returns a redirect without following it", async () => {
      const { client, url, received, close } = await h.make(301)

      try {
        const res = await client.send(makeRequest(url), new AbortController().signal)

        expect(res).toEqual({ status: 301 })
        expect(received()).toHaveLength(1)
      } finally {
        await close?.()
      }
    })

    it("rejects once the signal aborts an unanswered request", async () => {
      const { client, url, received, close } = await h.make("hang")

      try {
        const controller = new AbortController()
        const pending = client.send(makeRequest(url), controller.signal)

        await vi.waitFor(() => expect(received()).toHaveLength(1))
        controller.abort()

        await expect(pending).rejects.toMatchObject({ name: "AbortError" })
      } finally {
        await close?.()
      }
    })

    it("rejects when the signal is already aborted", async () => {
      const { client, url, close } = await h.make("hang")

      try {
        const controller = new AbortController()
        controller.abort()

        await expect(client.send(makeRequest(url), controller.signal)).rejects.toMatchObject({
          name: "AbortError",
        })
      } finally {
        await close?.()
      }
    })
  })
}
