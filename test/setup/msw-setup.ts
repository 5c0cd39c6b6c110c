import { setupServer } from 'msw/node'
import { afterAll, afterEach, beforeAll } from 'vitest'
import { tvmazeApiHandlers } from '../mocks/tvmaze-api-handlers.js'

/**
 * MSW (Mock Service Worker) setup for Vitest
 *
 * Intercepts fetch in-process so no test reaches the real TVMaze API.
 * Individual test files add their own request handlers with server.use().
 *
 * @see https://mswjs.io/docs/integrations/node
 */
export const server = setupServer(...tvmazeApiHandlers)

beforeAll(() => {
  server.listen({ onUnhandledRequest: 'error' })
})

/**
 * Reset handlers after each test to ensure test isolation
 */
afterEach(() => {
  server.resetHandlers()
})

afterAll(() => {
  server.close()
})
