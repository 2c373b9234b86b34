import 'dotenv/config'
import Fastify, { type FastifyError, type FastifyInstance } from 'fastify'
import fastifyCors from '@fastify/cors'
import { randomUUID } from 'node:crypto'
import type { IncomingMessage } from 'node:http'
import path from 'node:path'
import process from 'node:process'
import { fileURLToPath } from 'node:url'
import type { Dispatcher } from 'undici'
import { ConfigStore, loadConfig } from './config/manager.js'
import type { GatewayConfig } from './config/types.js'
import { GatewayMetrics } from './metrics/recorder.js'
import { BackendRegistry } from './providers/registry.js'
import { registerOpenAiRoutes } from './routes/openai.js'
import { REQUEST_ID_HEADER } from './routes/shared/reply.js'
import { registerSystemRoutes } from './routes/system.js'

export interface CreateServerOptions {
  config?: GatewayConfig | ConfigStore
  metrics?: GatewayMetrics
  /** Dispatcher for backend calls; replaces the connector's own undici Agent. */
  dispatcher?: Dispatcher
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  const candidate = Array.isArray(value) ? value[0] : value
  const trimmed = candidate?.trim()
  return trimmed ? trimmed : undefined
}

/**
 * Correlation id for a request: `X-Request-ID`, then `Request-Id`, otherwise
 * a fresh UUID v4. Node lower-cases header names, so matching is
 * case-insensitive.
 */
export function resolveRequestId(req: IncomingMessage): string {
  return firstHeader(req.headers[REQUEST_ID_HEADER]) ?? firstHeader(req.headers['request-id']) ?? randomUUID()
}

function describeMode(config: GatewayConfig): string {
  return config.backendUrl ? `backend=${config.backendUrl}` : 'echo mode'
}

export async function createServer(options: CreateServerOptions = {}): Promise<FastifyInstance> {
  const store = options.config instanceof ConfigStore ? options.config : new ConfigStore(options.config ?? loadConfig())
  const config = store.get()
  const metrics = options.metrics ?? new GatewayMetrics()

  const app = Fastify({
    logger: {
      level: config.logLevel
    },
    disableRequestLogging: true,
    bodyLimit: config.bodyLimit,
    requestIdHeader: false,
    requestIdLogLabel: 'requestId',
    genReqId: resolveRequestId
  })

  const backends = new BackendRegistry(store, { dispatcher: options.dispatcher, log: app.log })
  const stopWatchingConfig = store.onChange((next) => {
    app.log.info({ mode: describeMode(next) }, 'configuration updated')
  })
  app.addHook('onClose', async () => {
    stopWatchingConfig()
    await backends.close()
  })

  app.addHook('onRequest', async (request, reply) => {
    reply.header(REQUEST_ID_HEADER, request.id)
  })

  app.setErrorHandler((error: FastifyError, request, reply) => {
    const status =
      typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500
        ? error.statusCode
        : 500
    if (status >= 500) {
      request.log.error({ err: error }, 'unhandled error')
    } else {
      request.log.warn({ err: error }, 'request rejected')
    }
    const code = status === 500 ? 'internal_error' : status === 413 ? 'payload_too_large' : 'bad_request'
    return reply
      .code(status)
      .header(REQUEST_ID_HEADER, request.id)
      .header('content-type', 'application/json')
      .send({ error: code })
  })

  await app.register(fastifyCors, {
    origin: true,
    exposedHeaders: ['X-Request-ID']
  })

  // Bodies stay raw bytes on every route: chat completions classify and forward
  // them as received, and unknown paths reach the 404 handler unparsed.
  app.removeAllContentTypeParsers()
  app.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body)
  })

  await registerOpenAiRoutes(app, { metrics, backends })
  await registerSystemRoutes(app, { metrics })

  return app
}

export interface StartOptions {
  port?: number
  host?: string
  backendUrl?: string | null
}

export async function startServer(options: StartOptions = {}): Promise<FastifyInstance> {
  const loaded = loadConfig()
  const store = new ConfigStore(loaded)
  if (options.port !== undefined || options.host !== undefined || options.backendUrl !== undefined) {
    store.update({
      port: options.port ?? loaded.port,
      host: options.host ?? loaded.host,
      backendUrl: options.backendUrl === undefined ? loaded.backendUrl : options.backendUrl
    })
  }

  const config = store.get()
  const app = await createServer({ config: store })
  await app.listen({ port: config.port, host: config.host })
  app.log.info(`Inference gateway listening on ${config.host}:${config.port} (${describeMode(config)})`)
  return app
}

/**
 * Close the server on SIGINT/SIGTERM. In-flight requests are allowed to
 * finish before the process exits.
 */
export function installShutdownHandlers(app: FastifyInstance): void {
  let closing = false
  const shutdown = async (signal: NodeJS.Signals) => {
    if (closing) return
    closing = true
    app.log.info({ signal }, 'Shutting down.')
    try {
      await app.close()
      process.exit(0)
    } catch (err) {
      app.log.error({ err }, 'failed to close server')
      process.exit(1)
    }
  }

  process.once('SIGINT', (signal) => void shutdown(signal))
  process.once('SIGTERM', (signal) => void shutdown(signal))
}

async function main() {
  try {
    const app = await startServer()
    installShutdownHandlers(app)
  } catch (err) {
    console.error('Failed to start inference gateway:', err)
    process.exit(1)
  }
}

export { ConfigStore, loadConfig } from './config/manager.js'
export type { GatewayConfig } from './config/types.js'
export { GatewayMetrics } from './metrics/recorder.js'

const __filename = fileURLToPath(import.meta.url)
if (process.argv[1] && path.resolve(process.argv[1]) === __filename) {
  void main()
}
