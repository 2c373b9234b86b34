import type { Dispatcher } from 'undici'
import type { FastifyBaseLogger } from 'fastify'
import type { ConfigStore } from '../config/manager.js'
import type { GatewayConfig } from '../config/types.js'
import { createOpenAIConnector } from './openai.js'
import type { BackendConnector } from './types.js'

export interface BackendRegistryOptions {
  dispatcher?: Dispatcher
  log?: FastifyBaseLogger
}

/**
 * Keeps the connector for the currently configured backend. The connector is
 * rebuilt whenever the configured URL or timeouts change, so each request
 * picks up the configuration that is current when it arrives.
 */
export class BackendRegistry {
  private connector: BackendConnector | null = null
  private readonly unsubscribe: () => void

  constructor(
    private readonly store: ConfigStore,
    private readonly options: BackendRegistryOptions = {}
  ) {
    this.rebuild(store.get())
    this.unsubscribe = store.onChange((config) => this.rebuild(config))
  }

  current(): BackendConnector | null {
    return this.connector
  }

  async close(): Promise<void> {
    this.unsubscribe()
    const connector = this.connector
    this.connector = null
    await connector?.close()
  }

  private rebuild(config: GatewayConfig): void {
    const previous = this.connector
    this.connector = config.backendUrl
      ? createOpenAIConnector(config.backendUrl, {
          timeoutMs: config.backendTimeoutMs,
          modelsTimeoutMs: config.modelsTimeoutMs,
          dispatcher: this.options.dispatcher
        })
      : null

    if (previous) {
      // In-flight requests hold their own reference; the agent finishes them before closing.
      previous.close().catch((error: unknown) => {
        this.options.log?.error({ error, backendUrl: previous.baseUrl }, 'failed to close previous backend connector')
      })
    }
  }
}
