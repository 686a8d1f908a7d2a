export type StackFrame = {
  line?: string
  file?: string
  symbol?: string
}

/**
 * Canonical, transport-ready description of one error and its causes.
 *
 * @remarks
 * `causes: null` means the source has no notion of a cause chain, while an
 * empty array means it has one that happens to be exhausted.
 */
export type ErrorRecord = {
  class: string
  message: string | null
  causes: ErrorRecord[] | null
  frames?: StackFrame[]
}
