import { type ErrorLike, isErrorLike } from "./render"

export type ChainedShape = { kind: "chained"; error: ErrorLike }
export type AggregateShape = { kind: "aggregate"; error: ErrorLike; errors: readonly unknown[] }
export type OpaqueShape = { kind: "opaque"; value: unknown }

/** The closed set of inputs the normalizer understands. */
export type ErrorShape = ChainedShape | AggregateShape | OpaqueShape

export function classifyError(value: unknown): ErrorShape {
  if (!isErrorLike(value)) return { kind: "opaque", value }

  const errors = subErrors(value)

  if (errors) return { kind: "aggregate", error: value, errors }

  return { kind: "chained", error: value }
}

function subErrors(error: ErrorLike): readonly unknown[] | undefined {
  if (error instanceof AggregateError) return error.errors
  if ("errors" in error && Array.isArray(error.errors)) return error.errors

  return undefined
}
