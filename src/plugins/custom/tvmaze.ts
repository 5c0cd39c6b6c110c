import type { TvmazeServiceOptions } from '@root/types/tvmaze.types.js'
import { TvmazeService } from '@services/tvmaze.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    tvmaze: TvmazeService
  }
}

export default fp<TvmazeServiceOptions>(
  async (fastify: FastifyInstance, opts: TvmazeServiceOptions) => {
    const tvmazeService = new TvmazeService(fastify.log, {
      baseUrl: opts.baseUrl,
      timeoutMs: opts.timeoutMs,
    })

    fastify.decorate('tvmaze', tvmazeService)
  },
  {
    name: 'tvmaze',
    fastify: '5.x',
  },
)
