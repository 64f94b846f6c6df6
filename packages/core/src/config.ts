/**
 * Client configuration
 *
 * Priority: explicit option > environment variable > default.
 */

import { z } from 'zod'
import { DEFAULT_SERVER } from './api/utils.js'
import { DEFAULT_CACHE_TTL } from './cache/keys.js'
import { ValidationError } from './errors/index.js'
import type { AmeeClientConfig } from './api/types.js'

/**
 * Default per-call timeout: the stage server can be slow, but not this slow
 */
export const DEFAULT_TIMEOUT = 10_000

const ResolvedConfigSchema = z.object({
  server: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, '')),
  username: z.string().min(1, 'username is required (config.username or AMEE_USERNAME)'),
  password: z.string().min(1, 'password is required (config.password or AMEE_PASSWORD)'),
  timeout: z.number().int().positive(),
  cacheTtl: z.number().int().positive(),
})

export type ResolvedClientConfig = z.infer<typeof ResolvedConfigSchema>

function numberFromEnv(name: string): number | undefined {
  const raw = process.env[name]
  if (raw === undefined || raw.trim() === '') return undefined
  return Number(raw)
}

/**
 * Merge options, environment and defaults, then validate
 *
 * @throws ValidationError naming the first offending field
 */
export function resolveClientConfig(config: AmeeClientConfig = {}): ResolvedClientConfig {
  const candidate = {
    server: config.server || process.env.AMEE_SERVER || DEFAULT_SERVER,
    username: config.username || process.env.AMEE_USERNAME || '',
    password: config.password || process.env.AMEE_PASSWORD || '',
    timeout: config.timeout ?? numberFromEnv('AMEE_TIMEOUT_MS') ?? DEFAULT_TIMEOUT,
    cacheTtl: config.cacheTtl ?? numberFromEnv('AMEE_CACHE_TTL_MS') ?? DEFAULT_CACHE_TTL,
  }

  const parsed = ResolvedConfigSchema.safeParse(candidate)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue?.path.join('.')
    throw new ValidationError(`Invalid AMEE client configuration: ${field}: ${issue?.message}`, {
      field,
      context: { issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
    })
  }

  return parsed.data
}
