import tvmazePlugin from '@plugins/custom/tvmaze.js'
import { TvmazeService } from '@services/tvmaze.service.js'
import Fastify, { type FastifyInstance } from 'fastify'
import { afterEach, describe, expect, it } from 'vitest'
import { TEST_BASE_URL } from '../../mocks/tvmaze-api-handlers.js'
import '../../setup/msw-setup.js'

describe('tvmaze plugin', () => {
  let app: FastifyInstance

  afterEach(async () => {
    await app.close()
  })

  it('should decorate the instance with a TvmazeService', async () => {
    app = Fastify({ logger: false })
    await app.register(tvmazePlugin, { baseUrl: TEST_BASE_URL, timeoutMs: 5000 })
    await app.ready()

    expect(app.tvmaze).toBeInstanceOf(TvmazeService)
    expect(app.tvmaze.baseUrl).toBe(TEST_BASE_URL)
    expect(app.tvmaze.timeoutMs).toBe(5000)
  })

  it('should serve requests through the decorated service', async () => {
    app = Fastify({ logger: false })
    await app.register(tvmazePlugin, { baseUrl: TEST_BASE_URL })
    await app.ready()

    const show = await app.tvmaze.getShowDetails(1)

    expect(show).toMatchObject({ id: 1, name: 'Test Show' })
  })

  it('should fall back to service defaults without options', async () => {
    app = Fastify({ logger: false })
    await app.register(tvmazePlugin)
    await app.ready()

    expect(app.tvmaze.baseUrl).toBe('https://api.tvmaze.com')
    expect(app.tvmaze.timeoutMs).toBe(30000)
  })
})
