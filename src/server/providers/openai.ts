import { Agent, fetch, type Dispatcher } from 'undici'
import type { ReadableStream } from 'node:stream/web'
import { classifyTransportError } from './failures.js'
import { joinBackendUrl } from './utils.js'
import type {
  BackendConnector,
  BackendResponse,
  BackendResult,
  BackendTextResponse,
  ChatCompletionCall
} from './types.js'

export interface OpenAIConnectorOptions {
  /** Connect, headers and body timeout for chat completion calls. */
  timeoutMs: number
  /** Overall deadline for `GET /v1/models`. */
  modelsTimeoutMs: number
  /**
   * Dispatcher used for every call. When omitted the connector creates its own
   * undici `Agent` and closes it in `close()`.
   */
  dispatcher?: Dispatcher
}

async function collectText(body: ReadableStream<Uint8Array> | null): Promise<string> {
  if (!body) return ''
  const decoder = new TextDecoder()
  let text = ''
  for await (const chunk of body) {
    text += decoder.decode(chunk, { stream: true })
  }
  return text + decoder.decode()
}

export function createOpenAIConnector(baseUrl: string, options: OpenAIConnectorOptions): BackendConnector {
  const chatCompletionsUrl = joinBackendUrl(baseUrl, '/v1/chat/completions')
  const modelsUrl = joinBackendUrl(baseUrl, '/v1/models')
  const ownsDispatcher = options.dispatcher === undefined
  const dispatcher: Dispatcher =
    options.dispatcher ??
    new Agent({
      connect: { timeout: options.timeoutMs },
      headersTimeout: options.timeoutMs,
      bodyTimeout: options.timeoutMs
    })

  return {
    baseUrl,

    async postChatCompletion(call: ChatCompletionCall): Promise<BackendResult<BackendResponse>> {
      try {
        const res = await fetch(chatCompletionsUrl, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: call.body,
          signal: call.signal,
          dispatcher
        })
        return { ok: true, value: { status: res.status, body: res.body } }
      } catch (error) {
        return { ok: false, failure: classifyTransportError(error) }
      }
    },

    async readText(response: BackendResponse): Promise<BackendResult<string>> {
      try {
        return { ok: true, value: await collectText(response.body) }
      } catch (error) {
        return { ok: false, failure: classifyTransportError(error) }
      }
    },

    async listModels(): Promise<BackendResult<BackendTextResponse>> {
      try {
        const res = await fetch(modelsUrl, {
          method: 'GET',
          headers: { Accept: 'application/json' },
          signal: AbortSignal.timeout(options.modelsTimeoutMs),
          dispatcher
        })
        return { ok: true, value: { status: res.status, text: await collectText(res.body) } }
      } catch (error) {
        return { ok: false, failure: classifyTransportError(error) }
      }
    },

    async close(): Promise<void> {
      if (ownsDispatcher) {
        await dispatcher.close()
      }
    }
  }
}
