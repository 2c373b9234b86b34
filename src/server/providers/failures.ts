import type { TransportFailure } from './types.js'

const TIMEOUT_CODES = new Set([
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT'
])

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED'
])

const MAX_CAUSE_DEPTH = 5

interface ErrorLink {
  name?: string
  code?: string
  message?: string
}

function describe(value: unknown): ErrorLink {
  if (typeof value !== 'object' || value === null) {
    return typeof value === 'string' ? { message: value } : {}
  }
  const link: ErrorLink = {}
  if ('name' in value && typeof value.name === 'string') link.name = value.name
  if ('code' in value && typeof value.code === 'string') link.code = value.code
  if ('message' in value && typeof value.message === 'string') link.message = value.message
  return link
}

function causeChain(error: unknown): ErrorLink[] {
  const links: ErrorLink[] = []
  let current: unknown = error
  while (current != null && links.length < MAX_CAUSE_DEPTH) {
    links.push(describe(current))
    current = typeof current === 'object' && current !== null && 'cause' in current ? current.cause : undefined
  }
  return links
}

/**
 * Classify an error raised by `fetch` (or by reading a response body) into the
 * closed set of transport failures. undici wraps network errors in a
 * `TypeError('fetch failed')` whose `cause` carries the system or undici code.
 */
export function classifyTransportError(error: unknown): TransportFailure {
  const links = causeChain(error)
  const message = links.map((link) => link.message).find((text): text is string => Boolean(text)) ?? 'Unknown error'

  for (const link of links) {
    if (link.name === 'TimeoutError' || (link.code && TIMEOUT_CODES.has(link.code))) {
      return { kind: 'timeout', message, code: link.code }
    }
    if (link.code && CONNECTION_CODES.has(link.code)) {
      return { kind: 'connection_failed', message, code: link.code }
    }
  }

  const head = links[0]
  if (head?.name === 'TypeError' && (head.message === 'fetch failed' || head.message === 'terminated')) {
    return { kind: 'connection_failed', message, code: links.find((link) => link.code)?.code }
  }

  return { kind: 'other', message, code: links.find((link) => link.code)?.code }
}
