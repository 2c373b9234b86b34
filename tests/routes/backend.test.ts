import type { FastifyInstance } from 'fastify'
import { MockAgent, errors, type Interceptable } from 'undici'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ConfigStore, createConfig } from '../../src/server/config/manager.ts'
import { createServer } from '../../src/server/index.ts'
import { GatewayMetrics } from '../../src/server/metrics/recorder.ts'

const BACKEND_URL = 'http://backend.test'
const CHAT_PATH = '/v1/chat/completions'

const upstreamCompletion = {
  id: 'chatcmpl-upstream',
  object: 'chat.completion',
  model: 'small-model',
  choices: [{ index: 0, message: { role: 'assistant', content: 'Hi!' }, finish_reason: 'stop' }],
  usage: { prompt_tokens: 5, completion_tokens: 2, total_tokens: 7 }
}

function refusedError(): Error {
  return Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:9'), { code: 'ECONNREFUSED' })
}

describe('gateway in proxy mode', () => {
  let agent: MockAgent
  let backend: Interceptable
  let metrics: GatewayMetrics
  let store: ConfigStore
  let app: FastifyInstance

  beforeEach(async () => {
    agent = new MockAgent()
    agent.disableNetConnect()
    backend = agent.get(BACKEND_URL)
    metrics = new GatewayMetrics()
    store = new ConfigStore(createConfig({ logLevel: 'silent', backendUrl: BACKEND_URL }))
    app = await createServer({ config: store, metrics, dispatcher: agent })
  })

  afterEach(async () => {
    await app.close()
    agent.assertNoPendingInterceptors()
    await agent.close()
  })

  const postChat = (payload: string, requestId = 'req-proxy') =>
    app.inject({
      method: 'POST',
      url: CHAT_PATH,
      headers: { 'content-type': 'application/json', 'x-request-id': requestId },
      payload
    })

  describe('buffered completions', () => {
    it('returns the backend completion under the gateway request id', async () => {
      const payload = '{"model":"small-model","messages":[{"role":"user","content":"hi"}]}'
      backend
        .intercept({ path: CHAT_PATH, method: 'POST' })
        .reply(200, upstreamCompletion, { headers: { 'content-type': 'application/json' } })

      const response = await postChat(payload)

      expect(response.statusCode).toBe(200)
      expect(response.headers['x-request-id']).toBe('req-proxy')
      expect(response.json()).toEqual({ ...upstreamCompletion, id: 'req-proxy' })
      expect(metrics.snapshot()).toMatchObject({
        request_count: 1,
        error_count: 0,
        prompt_tokens_total: 5,
        completion_tokens_total: 2
      })
    })

    it('relays a client error from the backend with its status', async () => {
      backend
        .intercept({ path: CHAT_PATH, method: 'POST' })
        .reply(404, { error: { message: 'model not found' } }, { headers: { 'content-type': 'application/json' } })

      const response = await postChat('{"messages":[{"role":"user","content":"hi"}]}')

      expect(response.statusCode).toBe(404)
      expect(response.json()).toEqual({ error: { message: 'model not found' }, id: 'req-proxy' })
      expect(metrics.snapshot()).toMatchObject({ request_count: 1, error_count: 1 })
    })

    it('maps a backend 5xx to backend_error', async () => {
      backend.intercept({ path: CHAT_PATH, method: 'POST' }).reply(500, 'upstream exploded')

      const response = await postChat('{"messages":[{"role":"user","content":"hi"}]}')

      expect(response.statusCode).toBe(502)
      expect(response.json()).toEqual({ error: 'backend_error' })
      expect(metrics.snapshot()).toMatchObject({ request_count: 1, error_count: 1 })
    })

    it('maps a non-JSON body to backend_invalid_response', async () => {
      backend.intercept({ path: CHAT_PATH, method: 'POST' }).reply(200, '<html>proxy page</html>')

      const response = await postChat('{"messages":[{"role":"user","content":"hi"}]}')

      expect(response.statusCode).toBe(502)
      expect(response.json()).toEqual({ error: 'backend_invalid_response' })
    })

    it('maps a JSON body that is not an object to backend_invalid_response', async () => {
      backend.intercept({ path: CHAT_PATH, method: 'POST' }).reply(200, '[1,2,3]')

      const response = await postChat('{"messages":[{"role":"user","content":"hi"}]}')

      expect(response.statusCode).toBe(502)
      expect(response.json()).toEqual({ error: 'backend_invalid_response' })
    })

    it('maps a backend timeout to gateway_timeout', async () => {
      backend.intercept({ path: CHAT_PATH, method: 'POST' }).replyWithError(new errors.HeadersTimeoutError())

      const response = await postChat('{"messages":[{"role":"user","content":"hi"}]}')

      expect(response.statusCode).toBe(504)
      expect(response.json()).toEqual({ error: 'gateway_timeout' })
    })

    it('maps a refused connection to backend_unavailable', async () => {
      backend.intercept({ path: CHAT_PATH, method: 'POST' }).replyWithError(refusedError())

      const response = await postChat('{"messages":[{"role":"user","content":"hi"}]}')

      expect(response.statusCode).toBe(502)
      expect(response.json()).toEqual({ error: 'backend_unavailable' })
      expect(metrics.snapshot()).toMatchObject({ request_count: 1, error_count: 1, active_requests: 0 })
    })

    it('validates the request before contacting the backend', async () => {
      const response = await postChat('{"messages":[]}')

      expect(response.statusCode).toBe(400)
      expect(response.json()).toEqual({ error: 'invalid_messages' })
    })
  })

  describe('streaming completions', () => {
    const streamPayload = '{"stream":true,"messages":[{"role":"user","content":"hi"}]}'

    it('relays upstream lines and ends with a blank line', async () => {
      backend
        .intercept({ path: CHAT_PATH, method: 'POST' })
        .reply(200, 'data: {"delta":"a"}\n\ndata: {"delta":"b"}\r\n\r\ndata: [DONE]', {
          headers: { 'content-type': 'text/event-stream' }
        })

      const response = await postChat(streamPayload, 'req-stream')

      expect(response.statusCode).toBe(200)
      expect(response.headers['content-type']).toBe('text/event-stream')
      expect(response.headers['x-request-id']).toBe('req-stream')
      expect(response.body).toBe('data: {"delta":"a"}\n\ndata: {"delta":"b"}\n\ndata: [DONE]\n\n')
      expect(metrics.snapshot()).toMatchObject({
        request_count: 1,
        error_count: 0,
        prompt_tokens_total: 0,
        completion_tokens_total: 0
      })
    })

    it('returns a buffered backend_error when the backend fails before streaming', async () => {
      backend.intercept({ path: CHAT_PATH, method: 'POST' }).reply(503, 'overloaded')

      const response = await postChat(streamPayload)

      expect(response.statusCode).toBe(502)
      expect(response.headers['content-type']).toMatch(/^application\/json/)
      expect(response.json()).toEqual({ error: 'backend_error' })
    })

    it('returns a buffered gateway_timeout when the backend never answers', async () => {
      backend.intercept({ path: CHAT_PATH, method: 'POST' }).replyWithError(new errors.ConnectTimeoutError())

      const response = await postChat(streamPayload)

      expect(response.statusCode).toBe(504)
      expect(response.json()).toEqual({ error: 'gateway_timeout' })
    })

    it('relays a backend client error inside the event stream', async () => {
      backend.intercept({ path: CHAT_PATH, method: 'POST' }).reply(400, '{"error":"bad request"}')

      const response = await postChat(streamPayload)

      expect(response.statusCode).toBe(200)
      expect(response.headers['content-type']).toBe('text/event-stream')
      expect(response.body).toBe('{"error":"bad request"}\n\n')
    })
  })

  describe('GET /v1/models', () => {
    it('relays the backend listing', async () => {
      const listing = { object: 'list', data: [{ id: 'small-model', object: 'model', owned_by: 'lab' }] }
      backend
        .intercept({ path: '/v1/models', method: 'GET' })
        .reply(200, listing, { headers: { 'content-type': 'application/json' } })

      const response = await app.inject({ method: 'GET', url: '/v1/models' })

      expect(response.statusCode).toBe(200)
      expect(response.json()).toEqual(listing)
    })

    it('relays the backend status', async () => {
      backend.intercept({ path: '/v1/models', method: 'GET' }).reply(401, '{"error":"unauthorized"}')

      const response = await app.inject({ method: 'GET', url: '/v1/models' })

      expect(response.statusCode).toBe(401)
      expect(response.json()).toEqual({ error: 'unauthorized' })
    })

    it('maps a non-JSON listing to backend_invalid_response', async () => {
      backend.intercept({ path: '/v1/models', method: 'GET' }).reply(200, 'not json')

      const response = await app.inject({ method: 'GET', url: '/v1/models' })

      expect(response.statusCode).toBe(502)
      expect(response.json()).toEqual({ error: 'backend_invalid_response' })
    })

    it('maps transport failures', async () => {
      backend.intercept({ path: '/v1/models', method: 'GET' }).replyWithError(new errors.HeadersTimeoutError())
      backend.intercept({ path: '/v1/models', method: 'GET' }).replyWithError(refusedError())

      const timedOut = await app.inject({ method: 'GET', url: '/v1/models' })
      const refused = await app.inject({ method: 'GET', url: '/v1/models' })

      expect(timedOut.statusCode).toBe(504)
      expect(timedOut.json()).toEqual({ error: 'gateway_timeout' })
      expect(refused.statusCode).toBe(502)
      expect(refused.json()).toEqual({ error: 'backend_unavailable' })
    })

    it('does not count model listings in the metrics', async () => {
      backend.intercept({ path: '/v1/models', method: 'GET' }).reply(200, '{"object":"list","data":[]}')

      await app.inject({ method: 'GET', url: '/v1/models' })

      expect(metrics.snapshot().request_count).toBe(0)
    })
  })

  it('switches between echo and proxy mode when the configuration changes', async () => {
    store.update({ backendUrl: null })
    const echoed = await postChat('{"messages":[{"role":"user","content":"hi"}]}')
    expect(echoed.json().choices[0].message.content).toBe('Echo: hi')

    store.update({ backendUrl: BACKEND_URL })
    backend
      .intercept({ path: CHAT_PATH, method: 'POST' })
      .reply(200, upstreamCompletion, { headers: { 'content-type': 'application/json' } })
    const proxied = await postChat('{"messages":[{"role":"user","content":"hi"}]}')
    expect(proxied.json().choices[0].message.content).toBe('Hi!')
  })
})
