import { MockAgent, type Interceptable } from 'undici'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { probeGateway } from '../../src/cli/probe.ts'

const GATEWAY_URL = 'http://gateway.test'

describe('probeGateway', () => {
  let agent: MockAgent
  let gateway: Interceptable

  beforeEach(() => {
    agent = new MockAgent()
    agent.disableNetConnect()
    gateway = agent.get(GATEWAY_URL)
  })

  afterEach(async () => {
    await agent.close()
  })

  it('reports a healthy gateway with its metrics', async () => {
    gateway.intercept({ path: '/healthz', method: 'GET' }).reply(200, { status: 'ok' })
    gateway.intercept({ path: '/metrics', method: 'GET' }).reply(200, { request_count: 4, error_count: 1 })

    const report = await probeGateway(`${GATEWAY_URL}/`, agent)

    expect(report).toEqual({
      healthy: true,
      healthStatus: 200,
      metrics: { request_count: 4, error_count: 1 }
    })
  })

  it('reports an unhealthy status', async () => {
    gateway.intercept({ path: '/healthz', method: 'GET' }).reply(503, 'starting')

    const report = await probeGateway(GATEWAY_URL, agent)

    expect(report).toEqual({ healthy: false, healthStatus: 503, error: '/healthz returned 503' })
  })

  it('reports an unreachable gateway', async () => {
    gateway
      .intercept({ path: '/healthz', method: 'GET' })
      .replyWithError(Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }))

    const report = await probeGateway(GATEWAY_URL, agent)

    expect(report.healthy).toBe(false)
    expect(report.healthStatus).toBeUndefined()
    expect(report.error).toBe('fetch failed')
  })
})
