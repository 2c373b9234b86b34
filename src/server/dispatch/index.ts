import type { ClassifiedRequest } from '../protocol/types.js'
import { respondWithEcho } from './echo.js'
import { proxyBuffered, proxyStream } from './proxy.js'
import type { DispatchContext, DispatchOutcome } from './types.js'

/**
 * Route a validated chat completion. Echo mode answers from the extracted
 * prompt; proxy mode forwards the whole original body, `stream` included.
 */
export async function dispatchChatCompletion(
  ctx: DispatchContext,
  request: ClassifiedRequest
): Promise<DispatchOutcome> {
  if (!ctx.backend) {
    return respondWithEcho(ctx, request)
  }
  return request.stream
    ? proxyStream(ctx, ctx.backend, request)
    : proxyBuffered(ctx, ctx.backend, request)
}

export type { DispatchContext, DispatchMode, DispatchOutcome, TokenUsage } from './types.js'
