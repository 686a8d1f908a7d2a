import type { Seconds } from "../../ports/time"

export const DEFAULT_ENDPOINT = "https://api.honeybadger.io/v1/notices"
export const DEFAULT_TIMEOUT: Seconds = 5
