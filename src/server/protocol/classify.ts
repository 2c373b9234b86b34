import { extractLatestUserPrompt, isRecord } from './contentHelpers.js'
import type { ClassifyResult } from './types.js'

function toBuffer(raw: Buffer | string | undefined): Buffer {
  if (raw === undefined) return Buffer.alloc(0)
  return typeof raw === 'string' ? Buffer.from(raw, 'utf8') : raw
}

/**
 * Validate an inbound chat completion body and pick out the prompt used by the
 * echo responder. The raw bytes are kept so proxy mode can forward them
 * unchanged.
 */
export function classifyChatRequest(input: Buffer | string | undefined): ClassifyResult {
  const raw = toBuffer(input)

  let parsed: unknown
  try {
    parsed = JSON.parse(raw.toString('utf8'))
  } catch (error) {
    return {
      ok: false,
      error: 'invalid_json',
      detail: error instanceof Error ? error.message : 'Body is not valid JSON'
    }
  }

  if (!isRecord(parsed)) {
    return { ok: false, error: 'invalid_messages', detail: 'Body must be a JSON object with a messages array' }
  }

  const messages = parsed.messages
  if (!Array.isArray(messages) || messages.length === 0) {
    return { ok: false, error: 'invalid_messages', detail: '`messages` must be a non-empty array' }
  }

  return {
    ok: true,
    request: {
      raw,
      body: { ...parsed, messages },
      stream: parsed.stream === true,
      prompt: extractLatestUserPrompt(messages)
    }
  }
}
