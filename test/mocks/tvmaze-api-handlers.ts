import { HttpResponse, http } from 'msw'

/**
 * Default MSW handlers for the TVMaze API
 *
 * Tests point the service at TEST_BASE_URL and override these with
 * server.use() for specific scenarios.
 */

export const TEST_BASE_URL = 'https://mockapi.test'

export const tvmazeShowDetailsHandler = http.get(
  `${TEST_BASE_URL}/shows/:id`,
  ({ params }) => {
    const { id } = params
    return HttpResponse.json({
      id: Number(id),
      name: 'Test Show',
      type: 'Scripted',
      language: 'English',
      genres: ['Drama'],
      status: 'Running',
      premiered: '2024-01-01',
      externals: { tvrage: null, thetvdb: 1000, imdb: 'tt0000001' },
      updated: 1704067200,
    })
  },
)

export const tvmazeShowIndexHandler = http.get(`${TEST_BASE_URL}/shows`, () => {
  return HttpResponse.json([
    { id: 1, name: 'Test Show' },
    { id: 2, name: 'Another Test Show' },
  ])
})

export const tvmazeUpdatesHandler = http.get(
  `${TEST_BASE_URL}/updates/shows`,
  () => {
    return HttpResponse.json({ '1': 1704067200 })
  },
)

export const tvmazeApiHandlers = [
  tvmazeShowDetailsHandler,
  tvmazeShowIndexHandler,
  tvmazeUpdatesHandler,
]
