import { z } from 'zod'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const EnvSchema = z.object({
  COLLECTD_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  COLLECTD_TYPES_DB: z.string().min(1).optional(),
})

export interface CollectdConfig {
  logLevel: (typeof LOG_LEVELS)[number]
  typesDbPath: string | null  // null: use the bundled types.db
}

export class ConfigError extends Error {
  issues: z.ZodIssue[]

  constructor(issues: z.ZodIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): CollectdConfig {
  const result = EnvSchema.safeParse(env)
  if (!result.success) {
    throw new ConfigError(result.error.issues)
  }
  return {
    logLevel: result.data.COLLECTD_LOG_LEVEL,
    typesDbPath: result.data.COLLECTD_TYPES_DB ?? null,
  }
}
