import type { FastifyInstance } from 'fastify'
import type { GatewayMetrics } from '../metrics/recorder.js'
import { errorReply, jsonReply } from './shared/reply.js'

export interface SystemRouteDeps {
  metrics: GatewayMetrics
}

export async function registerSystemRoutes(app: FastifyInstance, deps: SystemRouteDeps): Promise<void> {
  app.get('/healthz', async (_request, reply) => jsonReply(reply, 200, { status: 'ok' }))

  app.get('/metrics', async (_request, reply) => jsonReply(reply, 200, deps.metrics.snapshot()))

  app.setNotFoundHandler(async (_request, reply) => errorReply(reply, 'not_found'))
}
