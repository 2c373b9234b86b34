#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander'
import process from 'node:process'
import { green, red, yellow } from 'colorette'
import { sanitizeBackendUrl } from '../server/config/manager.js'
import { installShutdownHandlers, startServer } from '../server/index.js'
import { DEFAULT_PROBE_URL, probeGateway } from './probe.js'

const program = new Command()

function parsePort(value: string): number {
  const port = Number(value)
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('port must be an integer between 1 and 65535')
  }
  return port
}

function parseBackendUrl(value: string): string | null {
  try {
    return sanitizeBackendUrl(value)
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err))
  }
}

interface StartCommandOptions {
  port?: number
  host?: string
  backendUrl?: string | null
}

async function handleStart(options: StartCommandOptions): Promise<void> {
  const app = await startServer(options)
  installShutdownHandlers(app)
}

async function handleProbe(options: { url: string }): Promise<void> {
  const report = await probeGateway(options.url)
  if (!report.healthy) {
    console.error(red(`gateway at ${options.url} is not healthy: ${report.error ?? 'unknown error'}`))
    process.exitCode = 1
    return
  }
  console.log(green(`gateway at ${options.url} is healthy`))
  if (report.metrics) {
    for (const [key, value] of Object.entries(report.metrics)) {
      console.log(`  ${key}: ${String(value)}`)
    }
  } else {
    console.log(yellow('  /metrics did not return a JSON object'))
  }
}

program
  .name('inference-gateway')
  .description('OpenAI-compatible chat completion gateway')
  .version('0.1.0')

program
  .command('start')
  .description('Run the gateway in the foreground')
  .option('--port <port>', 'listen port (overrides PORT)', parsePort)
  .option('--host <host>', 'listen address (overrides HOST)')
  .option('--backend-url <url>', 'backend base URL (overrides BACKEND_URL)', parseBackendUrl)
  .action(async (options: StartCommandOptions) => {
    try {
      await handleStart(options)
    } catch (err) {
      console.error(red(err instanceof Error ? err.message : String(err)))
      process.exitCode = 1
    }
  })

program
  .command('probe')
  .description('Print health and metrics of a running gateway')
  .option('--url <url>', 'gateway base URL', DEFAULT_PROBE_URL)
  .action(async (options: { url: string }) => {
    await handleProbe(options)
  })

await program.parseAsync(process.argv)
