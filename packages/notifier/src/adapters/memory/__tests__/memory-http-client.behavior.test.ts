import type { HttpRequest } from "../../../ports/http-client"
import { MemoryHttpClient } from "../memory-http-client"

function makeRequest(body: string): HttpRequest {
  return {
    method: "POST",
    url: new URL("https://notices.example.test/v1/notices"),
    headers: {},
    body: new TextEncoder().encode(body),
  }
}

describe("MemoryHttpClient", () => {
  it("answers from the queue, then from the fallback", async () => {
    const http = new MemoryHttpClient({ fallback: { kind: "status", status: 204 } }).enqueue({
      kind: "status",
      status: 500,
    })
    const signal = new AbortController().signal

    await expect(http.send(makeRequest("{}"), signal)).resolves.toEqual({ status: 500 })
    await expect(http.send(makeRequest("{}"), signal)).resolves.toEqual({ status: 204 })
    await expect(http.send(makeRequest("{}"), signal)).resolves.toEqual({ status: 204 })
  })

  it("answers 201 by default", async () => {
    const http = new MemoryHttpClient()

    await expect(
      http.send(makeRequest("{}"), new AbortController().signal),
    ).resolves.toEqual({ status: 201 })
  })

  it("rejects with the queued error", async () => {
    const error = new TypeError("socket hang up")
    const http = new MemoryHttpClient().enqueue({ kind: "fail", error })

    await expect(http.send(makeRequest("{}"), new AbortController().signal)).rejects.toBe(error)
  })

  it("rejects a hung request with the abort reason and counts it", async () => {
    const http = new MemoryHttpClient().enqueue({ kind: "hang" })
    const ac = new AbortController()
    const reason = new Error("stop")

    const pending = http.send(makeRequest("{}"), ac.signal)
    ac.abort(reason)

    await expect(pending).rejects.toBe(reason)
    expect(http.aborted).toBe(1)
  })

  it("decodes recorded bodies", async () => {
    const http = new MemoryHttpClient()
    const signal = new AbortController().signal

    await http.send(makeRequest('{"n":1}'), signal)
    await http.send(makeRequest('{"n":2}'), signal)

    expect(http.body()).toEqual({ n: 1 })
    expect(http.body(1)).toEqual({ n: 2 })
    expect(() => http.body(2)).toThrow("No request recorded at index 2")
  })
})
