import type { TransportFailure } from './providers/types.js'

export type GatewayErrorCode =
  | 'invalid_json'
  | 'invalid_messages'
  | 'backend_error'
  | 'backend_invalid_response'
  | 'backend_unavailable'
  | 'gateway_timeout'
  | 'not_found'

const ERROR_STATUS: Record<GatewayErrorCode, number> = {
  invalid_json: 400,
  invalid_messages: 400,
  not_found: 404,
  backend_error: 502,
  backend_invalid_response: 502,
  backend_unavailable: 502,
  gateway_timeout: 504
}

export interface GatewayErrorBody {
  error: string
}

export function errorStatus(code: GatewayErrorCode): number {
  return ERROR_STATUS[code]
}

export function errorBody(code: string): GatewayErrorBody {
  return { error: code }
}

/**
 * Translate a failed backend call into the client-facing code. Anything that
 * is not a timeout is reported as an unreachable backend.
 */
export function failureToErrorCode(failure: TransportFailure): GatewayErrorCode {
  switch (failure.kind) {
    case 'timeout':
      return 'gateway_timeout'
    case 'connection_failed':
    case 'other':
      return 'backend_unavailable'
  }
}
