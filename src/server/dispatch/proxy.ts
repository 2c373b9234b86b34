import { once } from 'node:events'
import type { ServerResponse } from 'node:http'
import type { ReadableStream } from 'node:stream/web'
import type { FastifyBaseLogger } from 'fastify'
import { failureToErrorCode } from '../errors.js'
import { isRecord } from '../protocol/contentHelpers.js'
import { LineSplitter } from '../protocol/lineSplitter.js'
import type { ClassifiedRequest } from '../protocol/types.js'
import type { BackendConnector, BackendResponse, TransportFailure } from '../providers/types.js'
import { openEventStream } from '../routes/shared/reply.js'
import { NO_USAGE, type DispatchContext, type DispatchMode, type DispatchOutcome, type TokenUsage } from './types.js'

function transportFailure(mode: DispatchMode, failure: TransportFailure): DispatchOutcome {
  const code = failure.code ? ` (${failure.code})` : ''
  return {
    kind: 'error',
    code: failureToErrorCode(failure),
    mode,
    detail: `${failure.kind}: ${failure.message}${code}`
  }
}

function upstreamServerError(mode: DispatchMode, status: number): DispatchOutcome {
  return {
    kind: 'error',
    code: 'backend_error',
    mode,
    detail: `Backend returned ${status}`,
    upstreamStatus: status
  }
}

async function discardBody(response: BackendResponse, log: FastifyBaseLogger): Promise<void> {
  if (!response.body) return
  try {
    await response.body.cancel()
  } catch (error) {
    log.debug({ error }, 'failed to discard backend response body')
  }
}

function toTokenCount(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : 0
}

function readUsage(usage: unknown): TokenUsage {
  if (!isRecord(usage)) return NO_USAGE
  return {
    promptTokens: toTokenCount(usage.prompt_tokens),
    completionTokens: toTokenCount(usage.completion_tokens)
  }
}

export async function proxyBuffered(
  ctx: DispatchContext,
  backend: BackendConnector,
  request: ClassifiedRequest
): Promise<DispatchOutcome> {
  const sent = await backend.postChatCompletion({ body: request.raw })
  if (!sent.ok) {
    return transportFailure('backend', sent.failure)
  }

  const upstream = sent.value
  if (upstream.status >= 500) {
    await discardBody(upstream, ctx.log)
    return upstreamServerError('backend', upstream.status)
  }

  const read = await backend.readText(upstream)
  if (!read.ok) {
    return transportFailure('backend', read.failure)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(read.value)
  } catch {
    parsed = undefined
  }
  if (!isRecord(parsed)) {
    return {
      kind: 'error',
      code: 'backend_invalid_response',
      mode: 'backend',
      detail: `Backend returned a non-object body with status ${upstream.status}`,
      upstreamStatus: upstream.status
    }
  }

  return {
    kind: 'json',
    status: upstream.status,
    mode: 'backend',
    usage: readUsage(parsed.usage),
    body: { ...parsed, id: ctx.requestId }
  }
}

type RelayEnd = 'completed' | 'client_disconnected' | 'upstream_failed'

/** Write relayed lines and wait for `drain` when the client socket is saturated. */
async function writeLines(client: ServerResponse, lines: string[], signal: AbortSignal): Promise<void> {
  if (lines.length === 0) return
  const text = lines.map((line) => `${line}\n`).join('')
  if (!client.write(text)) {
    await once(client, 'drain', { signal })
  }
}

async function relayLines(
  body: ReadableStream<Uint8Array> | null,
  client: ServerResponse,
  signal: AbortSignal,
  log: FastifyBaseLogger
): Promise<RelayEnd> {
  if (!body) {
    client.end('\n')
    return 'completed'
  }

  const reader = body.getReader()
  const splitter = new LineSplitter()
  let end: RelayEnd = 'completed'
  let drained = false

  try {
    while (!signal.aborted) {
      const { value, done } = await reader.read()
      if (done) {
        drained = true
        break
      }
      await writeLines(client, splitter.push(value), signal)
    }
    if (drained) {
      await writeLines(client, [...splitter.flush(), ''], signal)
    } else {
      end = 'client_disconnected'
    }
  } catch (error) {
    if (signal.aborted) {
      end = 'client_disconnected'
    } else {
      end = 'upstream_failed'
      log.error({ error }, 'backend stream failed after response started')
    }
  } finally {
    if (!drained) {
      await reader.cancel().catch((error: unknown) => {
        log.debug({ error }, 'backend stream already closed')
      })
    }
    reader.releaseLock()
    if (!client.destroyed) {
      client.end()
    }
  }

  return end
}

export async function proxyStream(
  ctx: DispatchContext,
  backend: BackendConnector,
  request: ClassifiedRequest
): Promise<DispatchOutcome> {
  const raw = ctx.reply.raw
  const controller = new AbortController()
  const onClientClose = () => {
    if (!raw.writableEnded) {
      controller.abort()
    }
  }
  raw.once('close', onClientClose)

  try {
    const sent = await backend.postChatCompletion({ body: request.raw, signal: controller.signal })
    if (!sent.ok) {
      return transportFailure('backend-stream', sent.failure)
    }

    const upstream = sent.value
    if (upstream.status >= 500) {
      await discardBody(upstream, ctx.log)
      return upstreamServerError('backend-stream', upstream.status)
    }

    const client = openEventStream(ctx.reply, ctx.requestId)
    const end = await relayLines(upstream.body, client, controller.signal, ctx.log)
    return {
      kind: 'streamed',
      mode: 'backend-stream',
      usage: NO_USAGE,
      interrupted: end === 'completed' ? undefined : end
    }
  } finally {
    raw.removeListener('close', onClientClose)
  }
}
