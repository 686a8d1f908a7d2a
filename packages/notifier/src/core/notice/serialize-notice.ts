import { z } from "zod"
import type { ErrorRecord } from "../../ports/error-record"
import type { Notice, WireError, WireNotice } from "../../ports/notice"
import { SerializationError } from "../../errors/notifier-errors"

const LONE_SURROGATE = /\p{Cs}/u

const contextSchema = z.record(z.string(), z.string()).nullable()

const encoder = new TextEncoder()

/**
 * Encode a notice as UTF-8 JSON in the endpoint's wire format.
 *
 * @throws SerializationError when the context is not a string map or a
 * string cannot be represented in UTF-8.
 */
export function serializeNotice(notice: Notice): Uint8Array {
  const context = contextSchema.safeParse(notice.request.context)

  if (!context.success) {
    throw new SerializationError(
      `Notice context must map strings to strings:\n${z.prettifyError(context.error)}`,
    )
  }

  return encoder.encode(stringify(toWireNotice(notice)))
}

export function toWireNotice(notice: Notice): WireNotice {
  return {
    api_key: notice.apiKey,
    notifier: {
      name: notice.notifier.name,
      url: notice.notifier.url,
      version: notice.notifier.version,
    },
    error: toWireError(notice.error),
    request: {
      context: notice.request.context,
      cgi_data: notice.request.environmentVariables,
    },
    server: {
      project_root: notice.server.projectRoot,
      environment_name: notice.server.environmentName,
      hostname: notice.server.hostname,
      time: notice.server.timeSeconds,
      pid: notice.server.pid,
    },
  }
}

function toWireError(record: ErrorRecord): WireError {
  return {
    class: record.class,
    message: record.message,
    causes: record.causes ? record.causes.map(toWireError) : null,
    ...(record.frames && record.frames.length > 0 && {
      backtrace: record.frames.map((frame) => ({
        number: frame.line ?? null,
        file: frame.file ?? null,
        method: frame.symbol ?? null,
      })),
    }),
  }
}

function stringify(wire: WireNotice): string {
  try {
    return JSON.stringify(wire, (key: string, value: unknown) => {
      if (LONE_SURROGATE.test(key)) {
        throw new SerializationError("Notice contains a key that is not valid UTF-8", {
          context: { key },
        })
      }

      if (typeof value === "string" && LONE_SURROGATE.test(value)) {
        throw new SerializationError("Notice contains a string that is not valid UTF-8", {
          context: { key },
        })
      }

      return value
    })
  } catch (err) {
    if (err instanceof SerializationError) throw err

    throw new SerializationError("Notice could not be encoded as JSON", { cause: err })
  }
}
