import type { CompletionChunk, CompletionResponse } from './types.js'

export const ECHO_MODEL = 'echo'

export const SSE_DONE_FRAME = 'data: [DONE]\n\n'

export interface CompletionInput {
  requestId: string
  content: string
  model?: string
  promptTokens?: number
  completionTokens?: number
}

export function buildCompletionResponse(input: CompletionInput): CompletionResponse {
  const promptTokens = input.promptTokens ?? 0
  const completionTokens = input.completionTokens ?? 0
  return {
    id: input.requestId,
    object: 'chat.completion',
    model: input.model ?? ECHO_MODEL,
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content: input.content },
        finish_reason: 'stop'
      }
    ],
    usage: {
      prompt_tokens: promptTokens,
      completion_tokens: completionTokens,
      total_tokens: promptTokens + completionTokens
    }
  }
}

export function buildCompletionChunk(requestId: string, content: string): CompletionChunk {
  return {
    id: requestId,
    object: 'chat.completion.chunk',
    choices: [
      {
        index: 0,
        delta: { role: 'assistant', content },
        finish_reason: 'stop'
      }
    ]
  }
}

export function formatSseFrame(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`
}
