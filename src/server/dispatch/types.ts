import type { FastifyBaseLogger, FastifyReply } from 'fastify'
import type { GatewayErrorCode } from '../errors.js'
import type { BackendConnector } from '../providers/types.js'

export type DispatchMode = 'echo' | 'echo-stream' | 'backend' | 'backend-stream'

export interface TokenUsage {
  promptTokens: number
  completionTokens: number
}

export const NO_USAGE: TokenUsage = { promptTokens: 0, completionTokens: 0 }

export interface DispatchContext {
  requestId: string
  reply: FastifyReply
  log: FastifyBaseLogger
  /** Connector for the backend configured when the request arrived; `null` in echo mode. */
  backend: BackendConnector | null
}

export type DispatchOutcome =
  | { kind: 'json'; status: number; body: unknown; mode: DispatchMode; usage: TokenUsage }
  | {
      kind: 'streamed'
      mode: DispatchMode
      usage: TokenUsage
      /** Set when the stream ended early; the client already has a 200. */
      interrupted?: 'client_disconnected' | 'upstream_failed'
    }
  | {
      kind: 'error'
      code: GatewayErrorCode
      mode: DispatchMode
      detail: string
      upstreamStatus?: number
    }
