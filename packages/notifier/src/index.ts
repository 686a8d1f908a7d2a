export { Client, type ClientDeps } from "./client/client"

export { ConfigBuilder, type ConfigBuilderDeps, type ConfigOverrides } from "./core/config/config-builder"
export { DEFAULT_ENDPOINT, DEFAULT_TIMEOUT } from "./core/config/defaults"
export { type ConfigEnv, configEnvSchema, readConfigEnv } from "./core/config/env-schema"
export { resolveSetting } from "./core/config/resolve-setting"

export { classifyStatus } from "./core/delivery/classify-status"
export { type DeliverDeps, deliver, MAX_TIMER_DELAY_MS } from "./core/delivery/deliver"

export { classifyError, type ErrorShape } from "./core/normalize/classify-error"
export { errorChain } from "./core/normalize/error-chain"
export { normalizeError } from "./core/normalize/normalize-error"
export { parseStack } from "./core/normalize/parse-stack"

export { buildNotice, buildPayload, type NoticeDeps, safeNowMs, unixSeconds } from "./core/notice/build-notice"
export { buildRequest } from "./core/notice/build-request"
export { NOTIFIER, NOTIFIER_VERSION } from "./core/notice/notifier-info"
export { serializeNotice, toWireNotice } from "./core/notice/serialize-notice"
export { userAgent } from "./core/notice/user-agent"

export { BaseError, type BaseErrorOptions } from "./errors/base-error"
export { DeliveryError, type DeliveryErrorCode } from "./errors/delivery-error"
export { ConfigError, SerializationError, TransportInitError } from "./errors/notifier-errors"
export { serializeError, type SerializeOptions } from "./errors/serialize-error"

export { FakeClock } from "./adapters/clock/fake-clock"
export { SystemClock } from "./adapters/clock/system-clock"
export { FetchHttpClient, type FetchHttpClientDeps } from "./adapters/fetch/fetch-http-client"
export { ProcessHost } from "./adapters/host/process-host"
export { StaticHost, type StaticHostOptions } from "./adapters/host/static-host"
export { NullLogger } from "./adapters/logger/null-logger"
export { PinoLogger, type PinoLoggerDeps } from "./adapters/logger/pino-logger"
export {
  MemoryHttpClient,
  type MemoryHttpClientOptions,
  type MemoryReply,
} from "./adapters/memory/memory-http-client"

export type * from "./ports/client-config"
export type * from "./ports/clock"
export type * from "./ports/delivery-outcome"
export type * from "./ports/error"
export type * from "./ports/error-record"
export type * from "./ports/host"
export type * from "./ports/http-client"
export type * from "./ports/log-context"
export type * from "./ports/logger"
export type * from "./ports/logger-options"
export type * from "./ports/notice"
export type * from "./ports/time"
export { type LogLevelName, logLevelNames } from "./ports/log-level"
