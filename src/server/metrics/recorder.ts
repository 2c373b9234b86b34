export interface RequestOutcome {
  /** Status code actually sent to the client. */
  status: number
  latencyMs: number
  promptTokens?: number
  completionTokens?: number
}

export interface MetricsSnapshot {
  request_count: number
  error_count: number
  total_latency_ms: number
  prompt_tokens_total: number
  completion_tokens_total: number
  active_requests: number
}

const roundTwoDecimals = (value: number): number => Math.round(value * 100) / 100

const toCount = (value: number | undefined): number =>
  typeof value === 'number' && Number.isFinite(value) && value > 0 ? Math.floor(value) : 0

/**
 * Process-wide chat completion counters. One instance is created at startup
 * and handed to the routes; every update is a single synchronous call.
 */
export class GatewayMetrics {
  private requestCount = 0
  private errorCount = 0
  private totalLatencyMs = 0
  private promptTokensTotal = 0
  private completionTokensTotal = 0
  private activeRequests = 0

  requestStarted(): void {
    this.activeRequests += 1
  }

  /** Record a finished request. Must be called exactly once per request. */
  record(outcome: RequestOutcome): void {
    if (this.activeRequests > 0) {
      this.activeRequests -= 1
    }
    this.requestCount += 1
    this.totalLatencyMs += Math.max(0, outcome.latencyMs)
    this.promptTokensTotal += toCount(outcome.promptTokens)
    this.completionTokensTotal += toCount(outcome.completionTokens)
    if (outcome.status >= 400) {
      this.errorCount += 1
    }
  }

  snapshot(): MetricsSnapshot {
    return {
      request_count: this.requestCount,
      error_count: this.errorCount,
      total_latency_ms: roundTwoDecimals(this.totalLatencyMs),
      prompt_tokens_total: this.promptTokensTotal,
      completion_tokens_total: this.completionTokensTotal,
      active_requests: this.activeRequests
    }
  }
}
