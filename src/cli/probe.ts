import { fetch, type Dispatcher } from 'undici'
import { isRecord } from '../server/protocol/contentHelpers.js'
import { joinBackendUrl } from '../server/providers/utils.js'

export const DEFAULT_PROBE_URL = 'http://127.0.0.1:8080'
const PROBE_TIMEOUT_MS = 5_000

export interface ProbeReport {
  healthy: boolean
  /** Status of `GET /healthz`; absent when the gateway could not be reached. */
  healthStatus?: number
  metrics?: Record<string, unknown>
  error?: string
}

async function getJson(url: string, dispatcher?: Dispatcher): Promise<{ status: number; body: unknown }> {
  const res = await fetch(url, {
    headers: { Accept: 'application/json' },
    signal: AbortSignal.timeout(PROBE_TIMEOUT_MS),
    dispatcher
  })
  const text = await res.text()
  let body: unknown
  try {
    body = JSON.parse(text)
  } catch {
    body = undefined
  }
  return { status: res.status, body }
}

/** Query a running gateway's health and metrics endpoints. */
export async function probeGateway(baseUrl: string, dispatcher?: Dispatcher): Promise<ProbeReport> {
  try {
    const health = await getJson(joinBackendUrl(baseUrl, '/healthz'), dispatcher)
    const healthy = health.status === 200 && isRecord(health.body) && health.body.status === 'ok'
    if (!healthy) {
      return { healthy: false, healthStatus: health.status, error: `/healthz returned ${health.status}` }
    }
    const metrics = await getJson(joinBackendUrl(baseUrl, '/metrics'), dispatcher)
    return {
      healthy: true,
      healthStatus: health.status,
      metrics: isRecord(metrics.body) ? metrics.body : undefined
    }
  } catch (err) {
    return { healthy: false, error: err instanceof Error ? err.message : String(err) }
  }
}
