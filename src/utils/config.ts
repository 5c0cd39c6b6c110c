import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import {
  type AppConfig,
  AppConfigSchema,
  ClientConfigSchema,
} from '@schemas/config/config.schema.js'
import { config as loadDotenv } from 'dotenv'
import { z } from 'zod'

const __dirname = dirname(fileURLToPath(import.meta.url))
const projectRoot = resolve(__dirname, '..', '..')

// Load .env file early so both the client and logger see it
loadDotenv({ path: resolve(projectRoot, '.env') })

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

const ENV_KEYS = [
  'tvmazeBaseUrl',
  'tvmazeTimeoutMs',
  'logLevel',
  'logDestination',
  'logDir',
] as const

/**
 * Reads configuration from environment variables.
 *
 * Empty strings are treated as unset so that a blank line in .env falls back
 * to the default instead of failing validation.
 *
 * @throws {ConfigError} when a value is present but invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw: Record<string, string> = {}
  for (const key of ENV_KEYS) {
    const value = env[key]
    if (value !== undefined && value.trim() !== '') {
      raw[key] = value.trim()
    }
  }

  const result = AppConfigSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration:\n${z.prettifyError(result.error)}`,
    )
  }
  return result.data
}

/**
 * Applies programmatic overrides on top of the environment configuration and
 * validates the result.
 *
 * @throws {ConfigError} when the environment or an override is invalid
 */
export function resolveConfig(
  overrides: Partial<AppConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const result = ClientConfigSchema.safeParse({
    ...loadConfig(env),
    ...overrides,
  })
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration:\n${z.prettifyError(result.error)}`,
    )
  }
  return result.data
}
