import { execFile } from 'child_process'
import { isIP } from 'net'
import { promisify } from 'util'
import type { Logger } from '../utils/logger.js'

export interface PingResult {
  ip_address: string
  status: 'online' | 'offline'
  response_time_ms: number | null
}

export type PingExec = (
  file: string,
  args: string[],
  options: { timeout: number; signal?: AbortSignal }
) => Promise<{ stdout: string }>

export interface PingOptions {
  timeoutMs?: number
  platform?: NodeJS.Platform
  exec?: PingExec
  /** Kills a running ping and stops filterResponsive from starting new ones */
  signal?: AbortSignal
}

const execFileAsync = promisify(execFile)
const defaultExec: PingExec = (file, args, options) => execFileAsync(file, args, options)

/**
 * Arguments for a single echo request with a reply deadline
 */
export function buildPingArgs(ip: string, timeoutMs: number, platform: NodeJS.Platform = process.platform): string[] {
  const family = isIP(ip) === 6 ? ['-6'] : []

  if (platform === 'win32') {
    return [...family, '-n', '1', '-w', String(timeoutMs), ip]
  }
  if (platform === 'darwin') {
    // macOS: -W is in milliseconds; IPv6 goes through ping6, which has no -W
    return family.length > 0 ? ['-c', '1', ip] : ['-c', '1', '-W', String(timeoutMs), ip]
  }
  return [...family, '-c', '1', '-W', String(Math.max(1, Math.ceil(timeoutMs / 1000))), ip]
}

/**
 * Ping a single IP address and return the result
 */
export async function pingHost(ip: string, logger: Logger, options: PingOptions = {}): Promise<PingResult> {
  const { timeoutMs = 1000, platform = process.platform, exec = defaultExec, signal } = options
  const command = platform === 'darwin' && isIP(ip) === 6 ? 'ping6' : 'ping'
  const args = buildPingArgs(ip, timeoutMs, platform)

  logger.debug(`Pinging ${ip}...`)

  try {
    // Give the process a little longer than its own reply deadline
    const { stdout } = await exec(command, args, { timeout: timeoutMs + 1000, signal })
    const match = /time[=<]\s*([\d.]+)\s*ms/i.exec(stdout)
    const rtt = match ? parseFloat(match[1]) : null

    logger.debug(`${ip} is responding${rtt !== null ? `, pinged in ${rtt}ms` : ''}`)
    return { ip_address: ip, status: 'online', response_time_ms: rtt }
  } catch (err) {
    // ping exits non-zero when there is no reply
    const message = err instanceof Error ? err.message : String(err)
    logger.debug(`${ip} isn't responding: ${message}`)
    return { ip_address: ip, status: 'offline', response_time_ms: null }
  }
}

/**
 * Keep only the addresses that answer a ping, in their original order
 */
export async function filterResponsive(
  addresses: readonly string[],
  logger: Logger,
  options: PingOptions & { concurrency?: number } = {}
): Promise<string[]> {
  const { concurrency = 50, ...pingOptions } = options
  const { signal } = pingOptions
  const queue = [...addresses]
  const online = new Set<string>()

  const workers = Array(Math.min(concurrency, queue.length))
    .fill(null)
    .map(async () => {
      while (queue.length > 0 && !signal?.aborted) {
        const ip = queue.shift()
        if (ip === undefined) break
        const result = await pingHost(ip, logger, pingOptions)
        if (result.status === 'online') {
          online.add(ip)
        }
      }
    })

  await Promise.all(workers)

  if (signal?.aborted) {
    logger.warn(`Ping check aborted: ${online.size}/${addresses.length} hosts responded before the interrupt`)
  } else {
    logger.info(`Ping check complete: ${online.size}/${addresses.length} hosts responded`)
  }

  return addresses.filter(ip => online.has(ip))
}
