/**
 * TVMaze Service
 *
 * Client for the public TVMaze REST API. Issues single GET requests against
 * fixed endpoints and returns the parsed JSON body. A 404 is reported as null;
 * every other failure (transport, non-2xx status, undecodable body) is logged
 * and thrown as a TvmazeError subclass.
 */

import {
  type QueryParams,
  SUPPORTED_UPDATE_PERIODS,
  type ShowLookupSource,
  type ShowUpdates,
  type TvmazeServiceOptions,
  isShowUpdatePeriod,
} from '@root/types/tvmaze.types.js'
import {
  TvmazeCastListSchema,
  type TvmazeCastCredit,
  type TvmazeEpisode,
  TvmazeEpisodeListSchema,
  type TvmazeSearchResult,
  TvmazeSearchResultListSchema,
  type TvmazeSeason,
  TvmazeSeasonListSchema,
  type TvmazeShow,
  TvmazeShowListSchema,
  TvmazeShowSchema,
} from '@schemas/tvmaze/tvmaze.schema.js'
import { createServiceLogger } from '@utils/logger.js'
import {
  TvmazeHttpError,
  TvmazeParseError,
  TvmazeRequestError,
} from '@utils/tvmaze-error.js'
import { USER_AGENT } from '@utils/version.js'
import type { FastifyBaseLogger } from 'fastify'
import type { z } from 'zod'

/** Readable type name for log messages: 'array', 'null', or the typeof result */
function describeType(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  return typeof value
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export class TvmazeService {
  static readonly DEFAULT_BASE_URL = 'https://api.tvmaze.com'
  static readonly DEFAULT_TIMEOUT_MS = 30000
  static readonly SUPPORTED_UPDATE_PERIODS = SUPPORTED_UPDATE_PERIODS

  /** Characters of an undecodable body kept for logs and errors */
  private static readonly RESPONSE_SNIPPET_LENGTH = 100

  readonly baseUrl: string
  readonly timeoutMs: number
  private readonly log: FastifyBaseLogger

  constructor(baseLog: FastifyBaseLogger, options: TvmazeServiceOptions = {}) {
    this.log = createServiceLogger(baseLog, 'TVMAZE')
    this.baseUrl = (options.baseUrl ?? TvmazeService.DEFAULT_BASE_URL).replace(
      /\/+$/,
      '',
    )
    this.timeoutMs = options.timeoutMs ?? TvmazeService.DEFAULT_TIMEOUT_MS

    this.log.info(
      `TVMaze service initialized: baseUrl=${this.baseUrl}, timeoutMs=${this.timeoutMs}`,
    )
  }

  //
  // ============================================================
  // REQUEST PRIMITIVE
  // ============================================================
  //

  /**
   * GET an endpoint and return its parsed JSON body.
   *
   * @param endpoint - Path beginning with a slash, e.g. "/shows/1"
   * @param params - Query parameters appended to the URL
   * @returns The parsed body, or null when the API answers 404
   * @throws {TvmazeRequestError} on an unusable URL, network failure or timeout
   * @throws {TvmazeHttpError} on any other non-2xx status
   * @throws {TvmazeParseError} when the body is not valid JSON
   */
  async getFromTvmaze(
    endpoint: string,
    params: QueryParams = {},
  ): Promise<unknown> {
    const url = `${this.baseUrl}${endpoint}`
    this.log.debug({ params }, `Making API request: GET ${url}`)

    let response: Response
    try {
      const requestUrl = new URL(url)
      for (const [key, value] of Object.entries(params)) {
        requestUrl.searchParams.set(key, String(value))
      }

      response = await fetch(requestUrl.toString(), {
        method: 'GET',
        headers: {
          'User-Agent': USER_AGENT,
          Accept: 'application/json',
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (error) {
      throw this.requestFailed(url, error)
    }

    if (response.status === 404) {
      const hint =
        endpoint === '/updates/shows'
          ? ' This might indicate no updates for the requested period.'
          : ''
      this.log.info(
        `API returned 404 Not Found for ${url} (params: ${JSON.stringify(params)}).${hint}`,
      )
      return null
    }

    if (!response.ok) {
      this.log.error(
        { status: response.status, url },
        `API request failed for ${url} with status ${response.status}`,
      )
      throw new TvmazeHttpError(
        `TVMaze API returned ${response.status} for ${url}`,
        url,
        response.status,
      )
    }

    let text: string
    try {
      text = await response.text()
    } catch (error) {
      throw this.requestFailed(url, error)
    }

    try {
      const data: unknown = JSON.parse(text)
      return data
    } catch (error) {
      const snippet = text.slice(0, TvmazeService.RESPONSE_SNIPPET_LENGTH)
      this.log.error(
        { error, responseText: snippet },
        `Failed to decode JSON from ${url}`,
      )
      throw new TvmazeParseError(
        `TVMaze returned invalid JSON for ${url}`,
        url,
        snippet,
        error,
      )
    }
  }

  private requestFailed(url: string, error: unknown): TvmazeRequestError {
    this.log.error({ error, url }, `API request failed for ${url}`)
    return new TvmazeRequestError(
      `TVMaze request failed for ${url}`,
      url,
      error,
    )
  }

  //
  // ============================================================
  // SHOW INDEX & DETAILS
  // ============================================================
  //

  /**
   * Fetch one page of the show index (250 shows per page, ordered by ID)
   *
   * @returns The shows on the page, or null past the last page
   */
  async getShows(page: number): Promise<TvmazeShow[] | null> {
    this.log.info(`Fetching shows page ${page}.`)
    const data = await this.getFromTvmaze('/shows', { page })
    if (data === null) return null
    return this.validateList(TvmazeShowListSchema, data, `/shows page ${page}`)
  }

  async getShowDetails(showId: number): Promise<TvmazeShow | null> {
    const endpoint = `/shows/${showId}`
    this.log.info(`Fetching details for show ID ${showId}.`)
    const data = await this.getFromTvmaze(endpoint)
    if (data === null) return null
    return this.validateObject(TvmazeShowSchema, data, endpoint)
  }

  async getSeasons(showId: number): Promise<TvmazeSeason[] | null> {
    const endpoint = `/shows/${showId}/seasons`
    this.log.info(`Fetching seasons for show ID ${showId}.`)
    const data = await this.getFromTvmaze(endpoint)
    if (data === null) return null
    return this.validateList(TvmazeSeasonListSchema, data, endpoint)
  }

  async getEpisodes(showId: number): Promise<TvmazeEpisode[] | null> {
    const endpoint = `/shows/${showId}/episodes`
    this.log.info(`Fetching episodes for show ID ${showId}.`)
    const data = await this.getFromTvmaze(endpoint)
    if (data === null) return null
    return this.validateList(TvmazeEpisodeListSchema, data, endpoint)
  }

  async getSeasonEpisodes(seasonId: number): Promise<TvmazeEpisode[] | null> {
    const endpoint = `/seasons/${seasonId}/episodes`
    this.log.info(`Fetching episodes for season ID ${seasonId}.`)
    const data = await this.getFromTvmaze(endpoint)
    if (data === null) return null
    return this.validateList(TvmazeEpisodeListSchema, data, endpoint)
  }

  async getShowCast(showId: number): Promise<TvmazeCastCredit[] | null> {
    const endpoint = `/shows/${showId}/cast`
    this.log.info(`Fetching cast for show ID ${showId}.`)
    const data = await this.getFromTvmaze(endpoint)
    if (data === null) return null
    return this.validateList(TvmazeCastListSchema, data, endpoint)
  }

  //
  // ============================================================
  // SEARCH & LOOKUP
  // ============================================================
  //

  /**
   * Fuzzy search shows by name
   *
   * @returns Matches ordered by relevance score; empty for a blank query
   */
  async searchShows(query: string): Promise<TvmazeSearchResult[] | null> {
    const q = query.trim()
    if (q === '') {
      this.log.debug('Skipping show search for blank query')
      return []
    }

    this.log.info(`Searching shows matching "${q}".`)
    const data = await this.getFromTvmaze('/search/shows', { q })
    if (data === null) return null
    return this.validateList(
      TvmazeSearchResultListSchema,
      data,
      `/search/shows?q=${q}`,
    )
  }

  /**
   * Find a show by an external ID. TVMaze answers with a redirect to the
   * show resource, which fetch follows.
   *
   * @returns The show, or null when no show carries that ID
   */
  async lookupShow(
    source: ShowLookupSource,
    externalId: string | number,
  ): Promise<TvmazeShow | null> {
    this.log.info(`Looking up show by ${source} ID ${externalId}.`)
    const data = await this.getFromTvmaze('/lookup/shows', {
      [source]: externalId,
    })
    if (data === null) return null
    return this.validateObject(
      TvmazeShowSchema,
      data,
      `/lookup/shows?${source}=${externalId}`,
    )
  }

  //
  // ============================================================
  // UPDATES
  // ============================================================
  //

  /**
   * Fetch IDs of shows updated within the given period, mapped to their
   * last-updated unix timestamp.
   *
   * @param period - One of "day", "week" or "month"
   * @returns The update map ({} when the API answers 404), or null for an
   *   unsupported period or a malformed body
   */
  async getShowUpdates(period = 'day'): Promise<ShowUpdates | null> {
    if (!isShowUpdatePeriod(period)) {
      this.log.error(
        `Unsupported update period '${period}'. Use one of ${SUPPORTED_UPDATE_PERIODS.join(', ')}.`,
      )
      return null
    }

    const context = `/updates/shows?since=${period}`
    this.log.info(
      `Fetching show updates since last ${period} using API 'since' parameter.`,
    )

    const data = await this.getFromTvmaze('/updates/shows', { since: period })
    if (data === null) {
      this.log.info(
        `API returned 404 or request failed for ${context}. Assuming no updates.`,
      )
      return {}
    }

    if (!isPlainObject(data)) {
      this.log.error(
        `Unexpected response format from ${context}: ${describeType(data)}`,
      )
      return null
    }

    const updates: ShowUpdates = {}
    let ignored = 0
    for (const [showId, timestamp] of Object.entries(data)) {
      if (typeof timestamp === 'number' && Number.isInteger(timestamp)) {
        updates[showId] = timestamp
      } else {
        ignored++
      }
    }

    if (ignored > 0) {
      this.log.warn(
        `Some updates received from ${context} had non-integer timestamps and were ignored.`,
      )
    }

    this.log.info(
      `Obtained ${Object.keys(updates).length} show updates since last ${period} directly from API.`,
    )
    return updates
  }

  //
  // ============================================================
  // RESPONSE VALIDATION
  // ============================================================
  //

  private validateList<S extends z.ZodType>(
    schema: S,
    data: unknown,
    context: string,
  ): z.output<S> | null {
    if (!Array.isArray(data)) {
      this.log.error(
        `Unexpected non-list response for ${context}: ${describeType(data)}`,
      )
      return null
    }
    return this.validateShape(schema, data, context)
  }

  private validateObject<S extends z.ZodType>(
    schema: S,
    data: unknown,
    context: string,
  ): z.output<S> | null {
    if (!isPlainObject(data)) {
      this.log.error(
        `Unexpected non-object response for ${context}: ${describeType(data)}`,
      )
      return null
    }
    return this.validateShape(schema, data, context)
  }

  private validateShape<S extends z.ZodType>(
    schema: S,
    data: unknown,
    context: string,
  ): z.output<S> | null {
    const result = schema.safeParse(data)
    if (!result.success) {
      this.log.error(
        { issues: result.error.issues },
        `Invalid response shape for ${context}`,
      )
      return null
    }
    return result.data
  }
}
