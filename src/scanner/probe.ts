import * as net from 'net'
import type { ScanTarget } from './targets.js'

export type ProbeStatus = 'open' | 'closed' | 'errored'

export interface ProbeOutcome {
  target: ScanTarget
  status: ProbeStatus
  /** Set only for errored probes: 'timeout' or the socket error code */
  reason?: string
  elapsedMs: number
}

export type ConnectFn = (port: number, host: string) => net.Socket

export interface ProbeOptions {
  timeoutMs: number
  signal?: AbortSignal
  connect?: ConnectFn
}

export const TIMEOUT_REASON = 'timeout'

// Active refusal from the remote stack. Everything else is an error, not "closed".
const REFUSED_CODES = new Set(['ECONNREFUSED'])

const defaultConnect: ConnectFn = (port, host) => net.createConnection({ port, host })

/**
 * Attempt a single TCP connection to a target.
 *
 * The deadline starts when this is called, so callers should only call it once the
 * target has been admitted. Whichever of connect, error, deadline or abort happens first
 * decides the result and the socket is destroyed straight away.
 *
 * Resolves `null` when aborted: an abandoned probe has no outcome.
 */
export function probeTarget(target: ScanTarget, options: ProbeOptions): Promise<ProbeOutcome | null> {
  const { timeoutMs, signal, connect = defaultConnect } = options

  if (signal?.aborted) {
    return Promise.resolve(null)
  }

  return new Promise((resolve) => {
    const started = performance.now()
    let settled = false
    let socket: net.Socket | undefined

    const finish = (status: ProbeStatus | null, reason?: string) => {
      if (settled) return
      settled = true

      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
      if (socket) {
        socket.removeAllListeners()
        socket.destroy()
      }

      if (status === null) {
        resolve(null)
        return
      }

      const outcome: ProbeOutcome = { target, status, elapsedMs: performance.now() - started }
      if (reason !== undefined) {
        outcome.reason = reason
      }
      resolve(outcome)
    }

    const onAbort = () => finish(null)
    const timer = setTimeout(() => finish('errored', TIMEOUT_REASON), timeoutMs)
    signal?.addEventListener('abort', onAbort, { once: true })

    try {
      socket = connect(target.port, target.address)
    } catch (err) {
      finish('errored', err instanceof Error ? err.message : String(err))
      return
    }

    socket.once('connect', () => finish('open'))

    socket.once('error', (err: NodeJS.ErrnoException) => {
      if (err.code && REFUSED_CODES.has(err.code)) {
        finish('closed')
      } else {
        finish('errored', err.code ?? err.message)
      }
    })
  })
}
