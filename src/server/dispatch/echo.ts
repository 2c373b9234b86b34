import {
  buildCompletionChunk,
  buildCompletionResponse,
  formatSseFrame,
  SSE_DONE_FRAME
} from '../protocol/responseBuilder.js'
import { countTokens } from '../protocol/tokenizer.js'
import type { ClassifiedRequest } from '../protocol/types.js'
import { openEventStream } from '../routes/shared/reply.js'
import type { DispatchContext, DispatchOutcome } from './types.js'

export function respondWithEcho(ctx: DispatchContext, request: ClassifiedRequest): DispatchOutcome {
  const content = `Echo: ${request.prompt}`
  const usage = {
    promptTokens: countTokens(request.prompt),
    completionTokens: countTokens(content)
  }

  if (request.stream) {
    const raw = openEventStream(ctx.reply, ctx.requestId)
    raw.write(formatSseFrame(buildCompletionChunk(ctx.requestId, content)))
    raw.write(SSE_DONE_FRAME)
    raw.end()
    return { kind: 'streamed', mode: 'echo-stream', usage }
  }

  return {
    kind: 'json',
    status: 200,
    mode: 'echo',
    usage,
    body: buildCompletionResponse({
      requestId: ctx.requestId,
      content,
      promptTokens: usage.promptTokens,
      completionTokens: usage.completionTokens
    })
  }
}
