import type { ServerResponse } from 'node:http'
import type { FastifyReply } from 'fastify'
import { errorBody, errorStatus, type GatewayErrorBody, type GatewayErrorCode } from '../../errors.js'

export const REQUEST_ID_HEADER = 'x-request-id'

/**
 * Prepare a JSON reply. The caller returns the payload from the handler and
 * Fastify serializes it and sets `Content-Length`.
 */
export function jsonReply<T>(reply: FastifyReply, status: number, payload: T): T {
  reply.code(status)
  reply.header('content-type', 'application/json')
  return payload
}

export function errorReply(reply: FastifyReply, code: GatewayErrorCode): GatewayErrorBody {
  return jsonReply(reply, errorStatus(code), errorBody(code))
}

/**
 * Take the response over from Fastify and send SSE headers right away. Headers
 * already staged on the reply (request id, CORS) are carried over.
 */
export function openEventStream(reply: FastifyReply, requestId: string): ServerResponse {
  const staged: Record<string, number | string | string[] | undefined> = reply.getHeaders()
  reply.hijack()
  const raw = reply.raw
  raw.writeHead(200, {
    ...staged,
    'content-type': 'text/event-stream',
    'cache-control': 'no-cache',
    connection: 'keep-alive',
    'x-accel-buffering': 'no',
    [REQUEST_ID_HEADER]: requestId
  })
  raw.flushHeaders()
  return raw
}
