/**
 * Provider Configuration
 *
 * Explicit values win; anything left out falls back to the INFLUXDB_V2_*
 * environment variables the influx CLI also reads.
 */

import { z } from "zod"
import { ValidationError } from "../errors"

export const DEFAULT_URL = "http://localhost:8086"
export const DEFAULT_TIMEOUT_MS = 10_000

const providerConfigSchema = z.object({
  url: z.string().url(),
  token: z.string().min(1),
  timeoutMs: z.coerce.number().int().positive(),
})

export type ProviderConfig = z.infer<typeof providerConfigSchema>

export function loadProviderConfig(
  overrides: Partial<ProviderConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): ProviderConfig {
  const token = overrides.token ?? env.INFLUXDB_V2_TOKEN
  if (!token) {
    throw new ValidationError(
      "API token not configured. Please set INFLUXDB_V2_TOKEN environment variable or provide token in config.",
      "token"
    )
  }

  const result = providerConfigSchema.safeParse({
    url: overrides.url ?? env.INFLUXDB_V2_URL ?? DEFAULT_URL,
    token,
    timeoutMs: overrides.timeoutMs ?? env.INFLUXDB_V2_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
  })

  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue.path.join(".")
    throw new ValidationError(`Invalid provider configuration: ${field}: ${issue.message}`, field)
  }

  return result.data
}
