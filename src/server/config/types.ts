export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent'

export interface GatewayConfig {
  port: number
  host: string
  /**
   * Base URL of the upstream inference backend. `null` switches the gateway
   * into echo mode.
   */
  backendUrl: string | null
  logLevel: LogLevel
  /** Connect, headers and body timeout for chat completion calls. */
  backendTimeoutMs: number
  /** Overall timeout for the models listing passthrough. */
  modelsTimeoutMs: number
  bodyLimit: number
}

export type GatewayConfigPatch = Partial<GatewayConfig>
