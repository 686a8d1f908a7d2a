import type { ErrorRecord } from "../../ports/error-record"
import { classifyError } from "./classify-error"
import { errorChain } from "./error-chain"
import { parseStack } from "./parse-stack"
import { debugString, displayString, type ErrorLike, isErrorLike, renderChain } from "./render"

/**
 * Convert any thrown value into an {@link ErrorRecord}. Never throws.
 *
 * - Errors: name as class, the rendered cause chain as message, one record
 *   per chain link (each nesting the link after it), parsed stack frames
 * - Aggregate errors: one flat record per sub-error
 * - Anything else: display and debug renderings, no causes
 */
export function normalizeError(value: unknown): ErrorRecord {
  try {
    const shape = classifyError(value)

    switch (shape.kind) {
      case "chained":
        return fromChained(shape.error)
      case "aggregate":
        return fromAggregate(shape.error, shape.errors)
      case "opaque":
        return fromOpaque(shape.value)
    }
  } catch (err) {
    return { class: "UnrenderableError", message: debugString(err), causes: null }
  }
}

function fromChained(error: ErrorLike): ErrorRecord {
  const chain = errorChain(error)

  return {
    class: String(error.name),
    message: renderChain(chain),
    causes: chain.map((_, i) => linkRecord(chain, i)),
    frames: parseStack(error.stack),
  }
}

function linkRecord(chain: readonly unknown[], index: number): ErrorRecord {
  const link = chain[index]
  const hasNext = index + 1 < chain.length

  return {
    class: isErrorLike(link) ? String(link.name) : displayString(link),
    message: isErrorLike(link) ? String(link.message) : null,
    causes: hasNext ? [linkRecord(chain, index + 1)] : null,
  }
}

function fromAggregate(error: ErrorLike, errors: readonly unknown[]): ErrorRecord {
  return {
    class: displayString(error),
    message: debugString(error),
    causes: errors.map((sub) => ({
      class: displayString(sub),
      message: debugString(sub),
      causes: null,
    })),
  }
}

function fromOpaque(value: unknown): ErrorRecord {
  return { class: displayString(value), message: debugString(value), causes: null }
}
