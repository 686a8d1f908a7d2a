import { logLevelNames } from "@tattletale/notifier"
import { z } from "zod"

export const exampleEnvSchema = z.object({
  HONEYBADGER_API_KEY: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(logLevelNames).default("debug"),
  LOG_PRETTY: z
    .enum(["true", "false"])
    .default("true")
    .transform((v) => v === "true"),
})

export type ExampleEnv = z.infer<typeof exampleEnvSchema>

export function loadExampleEnv(env: NodeJS.ProcessEnv): ExampleEnv {
  const parsed = exampleEnvSchema.safeParse(env)

  if (!parsed.success) {
    throw new Error(`Invalid example environment:\n${z.prettifyError(parsed.error)}`)
  }

  return parsed.data
}
