import { inspect } from "node:util"

const DEBUG_DEPTH = 4
const UNRENDERABLE = "[unrenderable value]"

export type ErrorLike = {
  name: string
  message: string
  stack?: string
  cause?: unknown
}

export function isErrorLike(value: unknown): value is ErrorLike {
  if (value instanceof Error) return true
  if (typeof value !== "object" || value === null) return false

  return (
    "name" in value &&
    typeof value.name === "string" &&
    "message" in value &&
    typeof value.message === "string"
  )
}

/** Verbose single-line rendering used for notice messages. */
export function debugString(value: unknown): string {
  try {
    return inspect(value, { depth: DEBUG_DEPTH, breakLength: Infinity })
  } catch {
    return UNRENDERABLE
  }
}

/** Short human-readable rendering: `"TypeError: bad input"`, or the string itself. */
export function displayString(value: unknown): string {
  if (isErrorLike(value)) {
    return value.message ? `${value.name}: ${value.message}` : value.name
  }

  if (typeof value === "string") return value

  return debugString(value)
}

/** One line per link; every line after the first is prefixed with `Caused by: `. */
export function renderChain(chain: readonly unknown[]): string {
  return chain
    .map((link, i) => (i === 0 ? displayString(link) : `Caused by: ${displayString(link)}`))
    .join("\n")
}
