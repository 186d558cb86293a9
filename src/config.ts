import { ScanError } from './errors.js'
import { MAX_PORT } from './scanner/ports.js'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Config {
  timeoutMs: number
  concurrency: number
  logLevel: LogLevel
  logDir?: string
}

/**
 * Settings for one scan run. Frozen once created.
 */
export interface ScanConfig {
  readonly timeoutMs: number
  readonly verbose: boolean
  readonly concurrency: number
}

export const DEFAULT_TIMEOUT_MS = 1000
// Stays well below the common 1024 open-file limit
export const DEFAULT_CONCURRENCY = 256
// Largest delay setTimeout honours; anything above fires after 1ms
export const MAX_TIMEOUT_MS = 2_147_483_647

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value)
}

function parseIntEnv(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') {
    return fallback
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new ScanError('InvalidConfig', `${name} must be a positive integer, got "${raw}"`)
  }
  return parseInt(raw, 10)
}

/**
 * Load defaults from the environment. Command-line flags override these.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const logLevel = env.LOG_LEVEL?.toLowerCase() ?? 'info'
  if (!isLogLevel(logLevel)) {
    throw new ScanError('InvalidConfig', `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${env.LOG_LEVEL}"`)
  }

  return {
    timeoutMs: parseIntEnv(env, 'PORTSWEEP_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
    concurrency: parseIntEnv(env, 'PORTSWEEP_CONCURRENCY', DEFAULT_CONCURRENCY),
    logLevel,
    logDir: env.LOG_DIR || undefined,
  }
}

/**
 * Validate and freeze the settings for a scan
 */
export function createScanConfig(input: { timeoutMs: number; verbose?: boolean; concurrency?: number }): ScanConfig {
  const { timeoutMs, verbose = false, concurrency = DEFAULT_CONCURRENCY } = input

  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new ScanError('InvalidConfig', `Timeout must be a positive integer (ms), got ${timeoutMs}`)
  }
  if (timeoutMs > MAX_TIMEOUT_MS) {
    throw new ScanError('InvalidConfig', `Timeout must be at most ${MAX_TIMEOUT_MS}ms, got ${timeoutMs}`)
  }
  if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_PORT) {
    throw new ScanError('InvalidConfig', `Concurrency must be an integer between 1 and ${MAX_PORT}, got ${concurrency}`)
  }

  return Object.freeze({ timeoutMs, verbose, concurrency })
}
