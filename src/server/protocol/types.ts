/** Inbound OpenAI chat completion body. Unknown fields are forwarded untouched. */
export interface ChatCompletionRequest {
  messages: unknown[]
  stream?: unknown
  [key: string]: unknown
}

export interface CompletionUsage {
  prompt_tokens: number
  completion_tokens: number
  total_tokens: number
}

export interface CompletionResponse {
  id: string
  object: 'chat.completion'
  model: string
  choices: Array<{
    index: number
    message: { role: 'assistant'; content: string }
    finish_reason: 'stop'
  }>
  usage: CompletionUsage
}

export interface CompletionChunk {
  id: string
  object: 'chat.completion.chunk'
  choices: Array<{
    index: number
    delta: { role: 'assistant'; content: string }
    finish_reason: 'stop'
  }>
}

export interface ModelEntry {
  id: string
  object: 'model'
  owned_by: string
}

export interface ModelList {
  object: 'list'
  data: ModelEntry[]
}

export interface ClassifiedRequest {
  /** Request bytes exactly as received, forwarded as-is in proxy mode. */
  raw: Buffer
  body: ChatCompletionRequest
  stream: boolean
  /** Content of the latest user message, or `''` when there is none. */
  prompt: string
}

export type ClassifyResult =
  | { ok: true; request: ClassifiedRequest }
  | { ok: false; error: 'invalid_json' | 'invalid_messages'; detail: string }
