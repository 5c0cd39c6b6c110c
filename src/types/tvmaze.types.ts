/**
 * Type definitions for TVMaze client options and request parameters
 *
 * Response entity types are inferred from the zod schemas in
 * @schemas/tvmaze/tvmaze.schema.ts.
 */

export const SUPPORTED_UPDATE_PERIODS = ['day', 'week', 'month'] as const

export type ShowUpdatePeriod = (typeof SUPPORTED_UPDATE_PERIODS)[number]

// External ids accepted by /lookup/shows
export type ShowLookupSource = 'tvrage' | 'thetvdb' | 'imdb'

// Map of show ID to last-updated unix timestamp
export type ShowUpdates = Record<string, number>

export type QueryParams = Record<string, string | number>

export type TvmazeServiceOptions = {
  /** API base URL, default https://api.tvmaze.com */
  baseUrl?: string
  /** Per-request timeout in milliseconds, default 30000 */
  timeoutMs?: number
}

export function isShowUpdatePeriod(value: string): value is ShowUpdatePeriod {
  return SUPPORTED_UPDATE_PERIODS.some((period) => period === value)
}
