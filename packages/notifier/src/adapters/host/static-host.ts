import type { Host, Platform } from "../../ports/host"

export type StaticHostOptions = {
  env?: Record<string, string>
  pid?: number
  cwd?: string
  hostname?: string
  platform?: Platform
}

/** Fixed host facts, for tests and for embedding where the process is not the source of truth. */
export class StaticHost implements Host {
  private readonly envVars: Readonly<Record<string, string>>
  private readonly pidValue: number
  private readonly cwdValue: string | undefined
  private readonly hostnameValue: string | undefined
  private readonly platformValue: Platform

  constructor(options: StaticHostOptions = {}) {
    this.envVars = Object.freeze({ ...options.env })
    this.pidValue = options.pid ?? 1
    this.cwdValue = options.cwd
    this.hostnameValue = options.hostname
    this.platformValue = options.platform ?? { type: "Linux", release: "0.0.0" }
  }

  env(): Record<string, string> {
    return { ...this.envVars }
  }

  pid(): number {
    return this.pidValue
  }

  cwd(): string | undefined {
    return this.cwdValue
  }

  hostname(): string | undefined {
    return this.hostnameValue
  }

  platform(): Platform {
    return { ...this.platformValue }
  }
}
