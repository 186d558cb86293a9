import { setMaxListeners } from 'events'
import type { Logger } from '../utils/logger.js'
import type { ScanConfig } from '../config.js'
import { Channel } from '../utils/channel.js'
import { probeTarget, type ProbeOptions, type ProbeOutcome, type ProbeStatus } from './probe.js'
import type { ScanTarget } from './targets.js'

export type ProbeFn = (target: ScanTarget, options: ProbeOptions) => Promise<ProbeOutcome | null>

export interface ScanOptions {
  logger?: Logger
  /** Stops admission and abandons in-flight probes */
  signal?: AbortSignal
  probe?: ProbeFn
  /** Size of the work set, if known. Used for progress and to size the pool. */
  total?: number
}

const PROGRESS_INTERVAL = 100

/**
 * Probe every target with at most `config.concurrency` connection attempts in flight.
 *
 * A fixed pool of workers pulls targets from the shared iterator; each worker admits its
 * next target only after the previous one has settled. Outcomes are yielded as they
 * arrive, once per target, in no particular order.
 *
 * Aborting (or leaving the `for await` early) stops admission, abandons in-flight probes
 * without an outcome and waits for every worker to release its socket.
 */
export async function* scan(
  targets: Iterable<ScanTarget>,
  config: ScanConfig,
  options: ScanOptions = {}
): AsyncGenerator<ProbeOutcome, void, undefined> {
  const { logger, signal, probe = probeTarget, total } = options

  const controller = new AbortController()
  const onAbort = () => controller.abort()
  if (signal?.aborted) {
    controller.abort()
  } else {
    signal?.addEventListener('abort', onAbort, { once: true })
  }

  const pending = targets[Symbol.iterator]()
  const channel = new Channel<ProbeOutcome>()
  const counts: Record<ProbeStatus, number> = { open: 0, closed: 0, errored: 0 }
  let failed = false
  let failure: unknown

  const admit = (): ScanTarget | undefined => {
    if (controller.signal.aborted) return undefined
    const step = pending.next()
    return step.done ? undefined : step.value
  }

  const worker = async () => {
    for (let target = admit(); target; target = admit()) {
      const outcome = await probe(target, {
        timeoutMs: config.timeoutMs,
        signal: controller.signal,
      })
      if (outcome && !controller.signal.aborted) {
        channel.push(outcome)
      }
    }
  }

  const poolSize = Math.max(1, Math.min(config.concurrency, total ?? config.concurrency))
  // Every in-flight probe listens for abort
  setMaxListeners(poolSize + 1, controller.signal)
  logger?.debug(`Scan starting (${total ?? 'unknown'} targets, concurrency: ${poolSize}, timeout: ${config.timeoutMs}ms)`)

  const workers = Array(poolSize)
    .fill(null)
    .map(() => worker())

  const settled = Promise.all(workers).then(
    () => channel.close(),
    (err: unknown) => {
      failed = true
      failure = err
      controller.abort()
      channel.close()
    }
  )

  let received = 0
  try {
    for await (const outcome of channel) {
      received++
      counts[outcome.status]++

      if (received % PROGRESS_INTERVAL === 0) {
        logger?.debug(`Scan progress: ${received}/${total ?? '?'}`)
      }

      yield outcome
    }

    await settled
    if (failed) {
      throw failure
    }

    if (controller.signal.aborted) {
      logger?.warn(`Scan aborted after ${received}/${total ?? '?'} targets`)
    } else {
      logger?.debug(
        `Scan complete: ${received} probed, ${counts.open} open, ${counts.closed} closed, ${counts.errored} errored`
      )
    }
  } finally {
    signal?.removeEventListener('abort', onAbort)
    controller.abort()
    await settled
  }
}

/**
 * Run a scan to completion and collect every outcome
 */
export async function scanAll(
  targets: Iterable<ScanTarget>,
  config: ScanConfig,
  options: ScanOptions = {}
): Promise<ProbeOutcome[]> {
  const outcomes: ProbeOutcome[] = []
  for await (const outcome of scan(targets, config, options)) {
    outcomes.push(outcome)
  }
  return outcomes
}
