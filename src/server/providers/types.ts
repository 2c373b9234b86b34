import type { ReadableStream } from 'node:stream/web'

export type TransportFailureKind = 'timeout' | 'connection_failed' | 'other'

export interface TransportFailure {
  kind: TransportFailureKind
  message: string
  /** Error code found on the error or its cause chain, e.g. `ECONNREFUSED`. */
  code?: string
}

export type BackendResult<T> = { ok: true; value: T } | { ok: false; failure: TransportFailure }

export interface BackendResponse {
  status: number
  body: ReadableStream<Uint8Array> | null
}

export interface BackendTextResponse {
  status: number
  text: string
}

export interface ChatCompletionCall {
  /** Request body forwarded byte for byte. */
  body: Buffer | string
  /** Aborts the upstream exchange, e.g. when the client goes away. */
  signal?: AbortSignal
}

export interface BackendConnector {
  readonly baseUrl: string
  postChatCompletion(call: ChatCompletionCall): Promise<BackendResult<BackendResponse>>
  readText(response: BackendResponse): Promise<BackendResult<string>>
  listModels(): Promise<BackendResult<BackendTextResponse>>
  close(): Promise<void>
}
