function getCause(v: unknown): unknown {
  return typeof v === "object" && v !== null && "cause" in v ? v.cause : undefined
}

/**
 * Walk the `cause` chain starting at (and including) `err`.
 *
 * The walk stops at the first missing cause or at the first object seen
 * twice, so cyclic chains terminate. There is no depth cap.
 *
 * @example
 * ```ts
 * const root = new Error("disk full")
 * errorChain(new Error("save failed", { cause: root })) // [outer, root]
 * ```
 */
export function errorChain(err: unknown): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    const next = getCause(current)

    if (next === undefined) break
    current = next
  }

  return chain
}
