import type { Clock } from "../../ports/clock"
import type { Milliseconds, UnixMs } from "../../ports/time"

type PendingSleep = {
  wakeAt: UnixMs
  resolve: () => void
}

/**
 * Manually driven clock for tests.
 *
 * Sleeps stay pending until `advance()` moves time past their wake-up point
 * or their signal aborts.
 */
export class FakeClock implements Clock {
  private time: UnixMs
  private pending: PendingSleep[] = []

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  nowMs(): UnixMs {
    return this.time
  }

  /** Number of sleeps that have not woken yet. */
  get pendingSleeps(): number {
    return this.pending.length
  }

  advance(ms: Milliseconds): void {
    this.time += ms
    this.wake()
  }

  set(ms: UnixMs): void {
    this.time = ms
    this.wake()
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const entry: PendingSleep = {
        wakeAt: this.time + ms,
        resolve: () => {
          signal?.removeEventListener("abort", onAbort)
          resolve()
        },
      }

      const onAbort = () => {
        this.pending = this.pending.filter((p) => p !== entry)
        resolve()
      }

      this.pending.push(entry)
      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }

  private wake(): void {
    const due = this.pending.filter((p) => p.wakeAt <= this.time)

    this.pending = this.pending.filter((p) => p.wakeAt > this.time)

    for (const p of due) p.resolve()
  }
}
