import type { ErrorRecord } from "./error-record"
import type { UnixSeconds } from "./time"

export type NotifierInfo = Readonly<{
  name: string
  url: string
  version: string
}>

export type NoticeContext = Record<string, string>

export type RequestContext = {
  context: NoticeContext | null
  environmentVariables: Record<string, string>
}

export type ServerInfo = {
  projectRoot: string
  environmentName: string
  hostname: string
  timeSeconds: UnixSeconds
  pid: number
}

export type Notice = {
  apiKey: string
  notifier: NotifierInfo
  error: ErrorRecord
  request: RequestContext
  server: ServerInfo
}

export type WireBacktraceLine = {
  number: string | null
  file: string | null
  method: string | null
}

export type WireError = {
  class: string
  message: string | null
  causes: WireError[] | null
  backtrace?: WireBacktraceLine[]
}

/** JSON body accepted by the notices endpoint. Field names are the wire contract. */
export type WireNotice = {
  api_key: string
  notifier: { name: string; url: string; version: string }
  error: WireError
  request: {
    context: NoticeContext | null
    cgi_data: Record<string, string>
  }
  server: {
    project_root: string
    environment_name: string
    hostname: string
    time: UnixSeconds
    pid: number
  }
}
