import { z } from "zod"

const UNSIGNED_INTEGER = /^\+?\d+$/

/**
 * Environment variables that seed client defaults.
 *
 * A malformed `HONEYBADGER_TIMEOUT` is dropped rather than rejected, so the
 * next layer of resolution applies.
 */
export const configEnvSchema = z.object({
  HONEYBADGER_ROOT: z.string().optional(),
  ENV: z.string().optional(),
  HOSTNAME: z.string().optional(),
  HONEYBADGER_ENDPOINT: z.string().optional(),
  HONEYBADGER_TIMEOUT: z
    .string()
    .regex(UNSIGNED_INTEGER)
    .transform(Number)
    .refine(Number.isSafeInteger)
    .optional()
    .catch(undefined),
})

export type ConfigEnv = z.infer<typeof configEnvSchema>

export function readConfigEnv(env: Record<string, string | undefined>): ConfigEnv {
  return configEnvSchema.parse(env)
}
