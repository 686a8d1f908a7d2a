import type { TimeSource } from "../../ports/clock"
import type { ClientConfig } from "../../ports/client-config"
import type { ErrorRecord } from "../../ports/error-record"
import type { Host } from "../../ports/host"
import type { Notice, NoticeContext } from "../../ports/notice"
import type { UnixMs, UnixSeconds } from "../../ports/time"
import { NOTIFIER } from "./notifier-info"
import { serializeNotice } from "./serialize-notice"

export type NoticeDeps = {
  clock: TimeSource
  host: Host
}

export function buildNotice(
  config: ClientConfig,
  record: ErrorRecord,
  context: NoticeContext | null | undefined,
  deps: NoticeDeps,
): Notice {
  return {
    apiKey: config.apiKey,
    notifier: NOTIFIER,
    error: record,
    request: {
      context: context ? { ...context } : null,
      environmentVariables: deps.host.env(),
    },
    server: {
      projectRoot: config.projectRoot,
      environmentName: config.environmentName,
      hostname: config.hostname,
      timeSeconds: unixSeconds(deps.clock),
      pid: deps.host.pid(),
    },
  }
}

/** Build and encode in one step. Throws `SerializationError`. */
export function buildPayload(
  config: ClientConfig,
  record: ErrorRecord,
  context: NoticeContext | null | undefined,
  deps: NoticeDeps,
): Uint8Array {
  return serializeNotice(buildNotice(config, record, context, deps))
}

/** Whole seconds since the epoch; a clock that throws or misreports yields 0. */
export function unixSeconds(clock: TimeSource): UnixSeconds {
  const ms = safeNowMs(clock)

  return ms === undefined ? 0 : Math.floor(ms / 1000)
}

/** `clock.nowMs()`, or `undefined` when the clock throws or reports a non-finite or negative time. */
export function safeNowMs(clock: TimeSource): UnixMs | undefined {
  let ms: number

  try {
    ms = clock.nowMs()
  } catch {
    return undefined
  }

  if (!Number.isFinite(ms) || ms < 0) return undefined

  return ms
}
