import os from "node:os"
import process from "node:process"
import type { Host, Platform } from "../../ports/host"

export class ProcessHost implements Host {
  env(): Record<string, string> {
    const snapshot: Record<string, string> = {}

    for (const [key, value] of Object.entries(process.env)) {
      if (value !== undefined) snapshot[key] = value
    }

    return snapshot
  }

  pid(): number {
    return process.pid
  }

  cwd(): string | undefined {
    try {
      return process.cwd()
    } catch {
      return undefined
    }
  }

  hostname(): string | undefined {
    try {
      return os.hostname() || undefined
    } catch {
      return undefined
    }
  }

  platform(): Platform {
    return { type: os.type(), release: os.release() }
  }
}
