import type { Seconds } from "./time"

export type ClientConfig = Readonly<{
  apiKey: string
  projectRoot: string
  environmentName: string
  hostname: string
  endpoint: URL
  /** Upper bound for a single delivery attempt. */
  timeout: Seconds
}>
