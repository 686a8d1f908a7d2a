import process from "node:process"
import { ProcessHost } from "../../adapters/host/process-host"
import { ConfigError } from "../../errors/notifier-errors"
import type { ClientConfig } from "../../ports/client-config"
import type { Host } from "../../ports/host"
import type { Seconds } from "../../ports/time"
import { DEFAULT_ENDPOINT, DEFAULT_TIMEOUT } from "./defaults"
import { type ConfigEnv, readConfigEnv } from "./env-schema"
import { resolveSetting } from "./resolve-setting"

export type ConfigOverrides = {
  projectRoot?: string
  environmentName?: string
  hostname?: string
  endpoint?: string | URL
  timeout?: Seconds
}

export type ConfigBuilderDeps = {
  /** @default a snapshot of process.env taken at construction */
  env?: Record<string, string | undefined>
  /** Source of the cwd and hostname defaults. @default ProcessHost */
  host?: Host
}

/**
 * Immutable builder for {@link ClientConfig}.
 *
 * Values resolve as explicit `with*` override > environment variable >
 * computed default (cwd, OS hostname) > fallback:
 *
 * - `HONEYBADGER_ROOT` - project root
 * - `ENV` - environment name
 * - `HOSTNAME` - host name
 * - `HONEYBADGER_ENDPOINT` - notices endpoint
 * - `HONEYBADGER_TIMEOUT` - delivery timeout in whole seconds
 *
 * @example
 * ```ts
 * const config = new ConfigBuilder("test-key")
 *   .withEnvironment("production")
 *   .withTimeout(10)
 *   .build()
 * ```
 */
export class ConfigBuilder {
  private readonly rawEnv: Record<string, string | undefined>
  private readonly env: ConfigEnv
  private readonly host: Host

  constructor(
    private readonly apiKey: string,
    deps: ConfigBuilderDeps = {},
    private readonly overrides: Readonly<ConfigOverrides> = {},
  ) {
    this.rawEnv = deps.env ?? { ...process.env }
    this.env = readConfigEnv(this.rawEnv)
    this.host = deps.host ?? new ProcessHost()
  }

  withRoot(projectRoot: string): ConfigBuilder {
    return this.extend({ projectRoot })
  }

  withEnvironment(environmentName: string): ConfigBuilder {
    return this.extend({ environmentName })
  }

  withHostname(hostname: string): ConfigBuilder {
    return this.extend({ hostname })
  }

  withEndpoint(endpoint: string | URL): ConfigBuilder {
    return this.extend({ endpoint })
  }

  /** @throws ConfigError for negative or non-finite values */
  withTimeout(timeout: Seconds): ConfigBuilder {
    if (!Number.isFinite(timeout) || timeout < 0) {
      throw new ConfigError(`Invalid timeout: ${timeout}`, { context: { timeout } })
    }

    return this.extend({ timeout })
  }

  /** @throws ConfigError when the resolved endpoint is not a URL */
  build(): ClientConfig {
    const { overrides: o, env } = this

    const endpoint = resolveSetting<string | URL>(
      o.endpoint,
      env.HONEYBADGER_ENDPOINT,
      () => undefined,
      DEFAULT_ENDPOINT,
    )

    return Object.freeze({
      apiKey: this.apiKey,
      projectRoot: resolveSetting(o.projectRoot, env.HONEYBADGER_ROOT, () => this.host.cwd(), ""),
      environmentName: resolveSetting(o.environmentName, env.ENV, () => undefined, ""),
      hostname: resolveSetting(o.hostname, env.HOSTNAME, () => this.host.hostname(), ""),
      endpoint: parseEndpoint(endpoint),
      timeout: resolveSetting(o.timeout, env.HONEYBADGER_TIMEOUT, () => undefined, DEFAULT_TIMEOUT),
    })
  }

  private extend(patch: ConfigOverrides): ConfigBuilder {
    return new ConfigBuilder(
      this.apiKey,
      { env: this.rawEnv, host: this.host },
      { ...this.overrides, ...patch },
    )
  }
}

function parseEndpoint(endpoint: string | URL): URL {
  try {
    return new URL(endpoint)
  } catch (err) {
    throw new ConfigError(`Invalid endpoint: ${String(endpoint)}`, {
      context: { endpoint: String(endpoint) },
      cause: err,
    })
  }
}
