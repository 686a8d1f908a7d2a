export type Platform = {
  /** Operating system name, e.g. "Linux" or "Darwin". */
  type: string
  /** Operating system release, e.g. "6.1.0". */
  release: string
}

/**
 * Facts about the process and machine a notice is sent from.
 *
 * Methods are read at call time; nothing is cached by the port.
 */
export interface Host {
  /** Snapshot of the process environment. Unset variables are omitted. */
  env(): Record<string, string>

  pid(): number

  /** Current working directory, or `undefined` when it cannot be read. */
  cwd(): string | undefined

  /** Hostname reported by the OS, or `undefined` when unavailable. */
  hostname(): string | undefined

  platform(): Platform
}
