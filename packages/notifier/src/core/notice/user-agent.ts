import type { Host } from "../../ports/host"
import type { NotifierInfo } from "../../ports/notice"
import { NOTIFIER } from "./notifier-info"

/** `"<name> <version>; <os type>/<os release>"` */
export function userAgent(host: Host, notifier: NotifierInfo = NOTIFIER): string {
  const { type, release } = host.platform()

  return `${notifier.name} ${notifier.version}; ${type}/${release}`
}
