import { EventEmitter } from 'node:events'
import type { GatewayConfig, GatewayConfigPatch, LogLevel } from './types.js'

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

export const DEFAULT_PORT = 8080
export const DEFAULT_HOST = '0.0.0.0'
export const DEFAULT_BACKEND_TIMEOUT_MS = 60_000
export const DEFAULT_MODELS_TIMEOUT_MS = 10_000
export const DEFAULT_BODY_LIMIT = 10 * 1024 * 1024

export type ConfigEnv = Record<string, string | undefined>

function sanitizePort(raw: string | undefined): number {
  const trimmed = raw?.trim()
  if (!trimmed) return DEFAULT_PORT
  const port = Number(trimmed)
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid PORT value: "${raw}"`)
  }
  return port
}

export function sanitizeBackendUrl(raw: string | null | undefined): string | null {
  const trimmed = raw?.trim()
  if (!trimmed) return null
  let parsed: URL
  try {
    parsed = new URL(trimmed)
  } catch {
    throw new Error(`Invalid BACKEND_URL value: "${raw}"`)
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`BACKEND_URL must use http or https, got "${parsed.protocol}"`)
  }
  return trimmed
}

function sanitizeLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase()
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info'
}

export function createConfig(overrides: GatewayConfigPatch = {}): GatewayConfig {
  return Object.freeze({
    port: DEFAULT_PORT,
    host: DEFAULT_HOST,
    backendUrl: null,
    logLevel: 'info',
    backendTimeoutMs: DEFAULT_BACKEND_TIMEOUT_MS,
    modelsTimeoutMs: DEFAULT_MODELS_TIMEOUT_MS,
    bodyLimit: DEFAULT_BODY_LIMIT,
    ...overrides
  })
}

/**
 * Build the startup configuration from environment variables. Called once per
 * process; request handling only ever sees the resulting snapshot.
 */
export function loadConfig(env: ConfigEnv = process.env): GatewayConfig {
  return createConfig({
    port: sanitizePort(env.PORT),
    host: env.HOST?.trim() || DEFAULT_HOST,
    backendUrl: sanitizeBackendUrl(env.BACKEND_URL),
    logLevel: sanitizeLogLevel(env.LOG_LEVEL)
  })
}

type ConfigListener = (config: GatewayConfig) => void

/**
 * Owns the current configuration snapshot. Snapshots are frozen; `update`
 * replaces the whole snapshot so readers never observe a half-applied change.
 */
export class ConfigStore {
  private snapshot: GatewayConfig
  private readonly emitter = new EventEmitter()

  constructor(initial: GatewayConfig) {
    this.snapshot = Object.isFrozen(initial) ? initial : Object.freeze({ ...initial })
  }

  get(): GatewayConfig {
    return this.snapshot
  }

  update(patch: GatewayConfigPatch): GatewayConfig {
    const next: GatewayConfigPatch = { ...patch }
    if ('backendUrl' in patch) {
      next.backendUrl = sanitizeBackendUrl(patch.backendUrl)
    }
    this.snapshot = Object.freeze({ ...this.snapshot, ...next })
    this.emitter.emit('change', this.snapshot)
    return this.snapshot
  }

  onChange(listener: ConfigListener): () => void {
    this.emitter.on('change', listener)
    return () => {
      this.emitter.off('change', listener)
    }
  }
}
