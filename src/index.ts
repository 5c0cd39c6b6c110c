import type { AppConfig } from '@schemas/config/config.schema.js'
import { TvmazeService } from '@services/tvmaze.service.js'
import { resolveConfig } from '@utils/config.js'
import { createLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

export { default as tvmazePlugin } from '@plugins/custom/tvmaze.js'
export type {
  AppConfig,
  LogDestination,
  LogLevel,
} from '@schemas/config/config.schema.js'
export type {
  TvmazeCastCredit,
  TvmazeEpisode,
  TvmazePerson,
  TvmazeSearchResult,
  TvmazeSeason,
  TvmazeShow,
} from '@schemas/tvmaze/tvmaze.schema.js'
export { TvmazeService } from '@services/tvmaze.service.js'
export {
  type QueryParams,
  SUPPORTED_UPDATE_PERIODS,
  type ShowLookupSource,
  type ShowUpdatePeriod,
  type ShowUpdates,
  type TvmazeServiceOptions,
  isShowUpdatePeriod,
} from '@root/types/tvmaze.types.js'
export { ConfigError, loadConfig, resolveConfig } from '@utils/config.js'
export { createLogger, createServiceLogger } from '@utils/logger.js'
export {
  TvmazeError,
  TvmazeHttpError,
  TvmazeParseError,
  TvmazeRequestError,
  isTvmazeError,
} from '@utils/tvmaze-error.js'

export interface CreateTvmazeClientOptions {
  /** Overrides applied on top of the environment configuration */
  config?: Partial<AppConfig>
  /** Existing logger to use instead of building one from config */
  logger?: FastifyBaseLogger
}

/**
 * Builds a TvmazeService from environment configuration.
 *
 * @throws {ConfigError} when the merged configuration is invalid
 *
 * @example
 * const tvmaze = createTvmazeClient({ config: { logLevel: 'warn' } })
 * const show = await tvmaze.getShowDetails(1)
 */
export function createTvmazeClient(
  options: CreateTvmazeClientOptions = {},
): TvmazeService {
  const config = resolveConfig(options.config)
  const logger = options.logger ?? createLogger(config)
  return new TvmazeService(logger, {
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
  })
}
