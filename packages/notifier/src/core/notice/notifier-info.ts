import type { NotifierInfo } from "../../ports/notice"

export const NOTIFIER_VERSION = "0.1.0"

export const NOTIFIER: NotifierInfo = Object.freeze({
  name: "tattletale",
  url: "https://www.npmjs.com/package/@tattletale/notifier",
  version: NOTIFIER_VERSION,
})
