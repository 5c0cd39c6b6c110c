import { z } from 'zod'

export const LogLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
])

export const LogDestinationSchema = z.enum(['terminal', 'file', 'both'])

// Raw environment keys are camelCase, matching the .env file
export const AppConfigSchema = z
  .object({
    tvmazeBaseUrl: z
      .url({ error: 'Invalid URL format' })
      .default('https://api.tvmaze.com'),
    tvmazeTimeoutMs: z.coerce.number().int().positive().default(30000),
    logLevel: LogLevelSchema.default('info'),
    logDestination: LogDestinationSchema.default('terminal'),
    logDir: z.string().min(1).default('./data/logs'),
  })
  .transform((raw) => ({
    baseUrl: raw.tvmazeBaseUrl,
    timeoutMs: raw.tvmazeTimeoutMs,
    logLevel: raw.logLevel,
    logDestination: raw.logDestination,
    logDir: raw.logDir,
  }))

// Resolved settings, checked again after programmatic overrides are applied
export const ClientConfigSchema = z.object({
  baseUrl: z.url({ error: 'Invalid URL format' }),
  timeoutMs: z.number().int().positive(),
  logLevel: LogLevelSchema,
  logDestination: LogDestinationSchema,
  logDir: z.string().min(1),
})

export type LogLevel = z.infer<typeof LogLevelSchema>
export type LogDestination = z.infer<typeof LogDestinationSchema>
export type AppConfig = z.infer<typeof ClientConfigSchema>
