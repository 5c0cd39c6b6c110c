import { z } from 'zod'

// Entities only require a numeric id; unknown fields pass through untouched

export const TvmazeImageSchema = z
  .looseObject({
    medium: z.string().nullish(),
    original: z.string().nullish(),
  })
  .nullish()

export const TvmazeCountrySchema = z
  .looseObject({
    name: z.string(),
    code: z.string(),
    timezone: z.string(),
  })
  .nullish()

export const TvmazeNetworkSchema = z
  .looseObject({
    id: z.number(),
    name: z.string(),
    country: TvmazeCountrySchema,
  })
  .nullish()

const TvmazeRatingSchema = z.looseObject({ average: z.number().nullable() })

export const TvmazeExternalsSchema = z.looseObject({
  tvrage: z.number().nullish(),
  thetvdb: z.number().nullish(),
  imdb: z.string().nullish(),
})

export const TvmazeShowSchema = z.looseObject({
  id: z.number(),
  url: z.string().optional(),
  name: z.string().optional(),
  type: z.string().optional(),
  language: z.string().nullish(),
  genres: z.array(z.string()).optional(),
  status: z.string().optional(),
  runtime: z.number().nullish(),
  premiered: z.string().nullish(),
  ended: z.string().nullish(),
  officialSite: z.string().nullish(),
  rating: TvmazeRatingSchema.optional(),
  weight: z.number().optional(),
  network: TvmazeNetworkSchema,
  webChannel: TvmazeNetworkSchema,
  externals: TvmazeExternalsSchema.optional(),
  image: TvmazeImageSchema,
  summary: z.string().nullish(),
  updated: z.number().optional(),
})

export const TvmazeSeasonSchema = z.looseObject({
  id: z.number(),
  url: z.string().optional(),
  number: z.number().optional(),
  name: z.string().optional(),
  episodeOrder: z.number().nullish(),
  premiereDate: z.string().nullish(),
  endDate: z.string().nullish(),
  network: TvmazeNetworkSchema,
  image: TvmazeImageSchema,
  summary: z.string().nullish(),
})

export const TvmazeEpisodeSchema = z.looseObject({
  id: z.number(),
  url: z.string().optional(),
  name: z.string().optional(),
  season: z.number().optional(),
  number: z.number().nullish(),
  type: z.string().optional(),
  airdate: z.string().nullish(),
  airtime: z.string().nullish(),
  airstamp: z.string().nullish(),
  runtime: z.number().nullish(),
  rating: TvmazeRatingSchema.optional(),
  image: TvmazeImageSchema,
  summary: z.string().nullish(),
})

export const TvmazePersonSchema = z.looseObject({
  id: z.number(),
  name: z.string().optional(),
  image: TvmazeImageSchema,
})

export const TvmazeCharacterSchema = z.looseObject({
  id: z.number(),
  name: z.string().optional(),
  image: TvmazeImageSchema,
})

export const TvmazeCastCreditSchema = z.looseObject({
  person: TvmazePersonSchema,
  character: TvmazeCharacterSchema,
  self: z.boolean().optional(),
  voice: z.boolean().optional(),
})

export const TvmazeSearchResultSchema = z.looseObject({
  score: z.number(),
  show: TvmazeShowSchema,
})

export const TvmazeShowListSchema = z.array(TvmazeShowSchema)
export const TvmazeSeasonListSchema = z.array(TvmazeSeasonSchema)
export const TvmazeEpisodeListSchema = z.array(TvmazeEpisodeSchema)
export const TvmazeCastListSchema = z.array(TvmazeCastCreditSchema)
export const TvmazeSearchResultListSchema = z.array(TvmazeSearchResultSchema)

export type TvmazeShow = z.infer<typeof TvmazeShowSchema>
export type TvmazeSeason = z.infer<typeof TvmazeSeasonSchema>
export type TvmazeEpisode = z.infer<typeof TvmazeEpisodeSchema>
export type TvmazePerson = z.infer<typeof TvmazePersonSchema>
export type TvmazeCastCredit = z.infer<typeof TvmazeCastCreditSchema>
export type TvmazeSearchResult = z.infer<typeof TvmazeSearchResultSchema>
