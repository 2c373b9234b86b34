import { performance } from 'node:perf_hooks'
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify'
import { dispatchChatCompletion, type DispatchOutcome } from '../dispatch/index.js'
import { NO_USAGE } from '../dispatch/types.js'
import { errorStatus, failureToErrorCode } from '../errors.js'
import type { GatewayMetrics } from '../metrics/recorder.js'
import { classifyChatRequest } from '../protocol/classify.js'
import type { BackendRegistry } from '../providers/registry.js'
import { buildModelsResponse } from './shared/models-handler.js'
import { errorReply, jsonReply } from './shared/reply.js'

export interface OpenAiRouteDeps {
  metrics: GatewayMetrics
  backends: BackendRegistry
}

const roundTwoDecimals = (value: number): number => Math.round(value * 100) / 100

function outcomeStatus(outcome: DispatchOutcome): number {
  switch (outcome.kind) {
    case 'json':
      return outcome.status
    case 'streamed':
      return 200
    case 'error':
      return errorStatus(outcome.code)
  }
}

function logCompletion(request: FastifyRequest, outcome: DispatchOutcome, status: number, latencyMs: number): void {
  const fields: Record<string, unknown> = {
    status,
    latencyMs: roundTwoDecimals(latencyMs),
    mode: outcome.mode
  }
  if (outcome.kind === 'error') {
    fields.error = outcome.code
    fields.detail = outcome.detail
    if (outcome.upstreamStatus !== undefined) {
      fields.upstreamStatus = outcome.upstreamStatus
    }
  }
  if (outcome.kind === 'streamed' && outcome.interrupted) {
    fields.interrupted = outcome.interrupted
  }

  const message = 'POST /v1/chat/completions'
  if (status >= 500) {
    request.log.error(fields, message)
  } else if (status >= 400) {
    request.log.warn(fields, message)
  } else {
    request.log.info(fields, message)
  }
}

export async function registerOpenAiRoutes(app: FastifyInstance, deps: OpenAiRouteDeps): Promise<void> {
  const handleChatCompletion = async (request: FastifyRequest, reply: FastifyReply) => {
    const startedAt = performance.now()
    const backend = deps.backends.current()
    deps.metrics.requestStarted()

    let outcome: DispatchOutcome
    try {
      const classified = classifyChatRequest(Buffer.isBuffer(request.body) ? request.body : undefined)
      outcome = classified.ok
        ? await dispatchChatCompletion(
            { requestId: request.id, reply, log: request.log, backend },
            classified.request
          )
        : { kind: 'error', code: classified.error, mode: backend ? 'backend' : 'echo', detail: classified.detail }
    } catch (error) {
      deps.metrics.record({ status: 500, latencyMs: performance.now() - startedAt })
      throw error
    }

    const status = outcomeStatus(outcome)
    const latencyMs = performance.now() - startedAt
    const usage = outcome.kind === 'error' ? NO_USAGE : outcome.usage
    deps.metrics.record({
      status,
      latencyMs,
      promptTokens: usage.promptTokens,
      completionTokens: usage.completionTokens
    })
    logCompletion(request, outcome, status, latencyMs)

    switch (outcome.kind) {
      case 'json':
        return jsonReply(reply, outcome.status, outcome.body)
      case 'error':
        return errorReply(reply, outcome.code)
      case 'streamed':
        return reply
    }
  }

  app.post('/v1/chat/completions', handleChatCompletion)

  app.get('/v1/models', async (request, reply) => {
    const backend = deps.backends.current()
    if (!backend) {
      return jsonReply(reply, 200, buildModelsResponse())
    }

    const result = await backend.listModels()
    if (!result.ok) {
      const code = failureToErrorCode(result.failure)
      request.log.error({ error: code, detail: result.failure.message }, 'GET /v1/models backend call failed')
      return errorReply(reply, code)
    }

    const { status, text } = result.value
    try {
      JSON.parse(text)
    } catch {
      request.log.error({ error: 'backend_invalid_response', upstreamStatus: status }, 'GET /v1/models returned non-JSON')
      return errorReply(reply, 'backend_invalid_response')
    }
    // Relay the upstream body as-is; it is already valid JSON.
    return jsonReply(reply, status, text)
  })
}
