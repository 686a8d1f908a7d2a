/**
 * Pick a setting by precedence: explicit override, then environment, then a
 * computed default, then the hard-coded fallback.
 *
 * `computedDefault` runs only when both earlier layers are absent.
 *
 * @example
 * ```ts
 * resolveSetting(undefined, "staging", () => undefined, "") // "staging"
 * ```
 */
export function resolveSetting<T>(
  explicit: T | undefined,
  fromEnv: T | undefined,
  computedDefault: () => T | undefined,
  fallback: T,
): T {
  if (explicit !== undefined) return explicit
  if (fromEnv !== undefined) return fromEnv

  return computedDefault() ?? fallback
}
