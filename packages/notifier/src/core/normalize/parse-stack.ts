import type { StackFrame } from "../../ports/error-record"

const FRAME_WITH_SYMBOL = /^\s*at (.+?) \((.+)\)$/
const FRAME_WITHOUT_SYMBOL = /^\s*at (.+)$/
const LOCATION = /^(.*):(\d+):\d+$/

/**
 * Parse a V8 stack string into frames, innermost first.
 *
 * Only `at ...` lines describe frames; the header line and anything else
 * is skipped.
 */
export function parseStack(stack: string | undefined): StackFrame[] {
  if (!stack) return []

  const frames: StackFrame[] = []

  for (const line of stack.split("\n")) {
    const frame = parseFrame(line)
    if (frame) frames.push(frame)
  }

  return frames
}

function parseFrame(line: string): StackFrame | undefined {
  const withSymbol = FRAME_WITH_SYMBOL.exec(line)

  if (withSymbol?.[1] && withSymbol[2]) {
    return { ...parseLocation(withSymbol[2]), symbol: withSymbol[1].replace(/^async /, "") }
  }

  const bare = FRAME_WITHOUT_SYMBOL.exec(line)

  if (bare?.[1]) return parseLocation(bare[1])

  return undefined
}

function parseLocation(location: string): StackFrame {
  const match = LOCATION.exec(location)

  if (match?.[1] !== undefined && match[2]) {
    return { file: match[1], line: match[2] }
  }

  return { file: location }
}
