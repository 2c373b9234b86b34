import { ECHO_MODEL } from '../../protocol/responseBuilder.js'
import type { ModelList } from '../../protocol/types.js'

export const ECHO_MODEL_OWNER = 'inference-gateway'

/** Static `/v1/models` listing served while no backend is configured. */
export function buildModelsResponse(): ModelList {
  return {
    object: 'list',
    data: [
      {
        id: ECHO_MODEL,
        object: 'model',
        owned_by: ECHO_MODEL_OWNER
      }
    ]
  }
}
