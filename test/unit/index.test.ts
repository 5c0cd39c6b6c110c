import { ConfigError, TvmazeService, createTvmazeClient } from '@root/index.js'
import { describe, expect, it } from 'vitest'
import { createMockLogger } from '../mocks/logger.js'
import { TEST_BASE_URL } from '../mocks/tvmaze-api-handlers.js'
import '../setup/msw-setup.js'

describe('createTvmazeClient', () => {
  it('should apply config overrides on top of the environment', () => {
    const client = createTvmazeClient({
      config: { baseUrl: TEST_BASE_URL, timeoutMs: 1000, logLevel: 'silent' },
    })

    expect(client).toBeInstanceOf(TvmazeService)
    expect(client.baseUrl).toBe(TEST_BASE_URL)
    expect(client.timeoutMs).toBe(1000)
  })

  it('should use a provided logger', async () => {
    const logger = createMockLogger()

    const client = createTvmazeClient({
      config: { baseUrl: TEST_BASE_URL },
      logger,
    })
    const updates = await client.getShowUpdates('day')

    expect(updates).toEqual({ '1': 1704067200 })
    expect(logger.info).toHaveBeenCalledWith(
      'TVMaze service initialized: baseUrl=https://mockapi.test, timeoutMs=30000',
    )
  })

  it('should reject invalid config overrides', () => {
    expect(() =>
      createTvmazeClient({
        config: { baseUrl: 'not a url' },
        logger: createMockLogger(),
      }),
    ).toThrow(ConfigError)
  })
})
