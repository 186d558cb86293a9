import type { Logger } from '../utils/logger.js'
import type { ProbeOutcome } from '../scanner/probe.js'
import { formatTarget } from '../scanner/targets.js'
import { ScanSummary, formatHostStatus, type StatusCounts } from '../scanner/summary.js'

export interface Reporter {
  report(outcome: ProbeOutcome): void
  /** Log the per-host summary and return the totals */
  finish(): StatusCounts
}

export function formatOutcome(outcome: ProbeOutcome, verbose: boolean): string {
  const { target, status } = outcome
  if (!verbose) {
    return `Port ${target.port} on ${target.address} is ${status}`
  }

  const timing = `${formatTarget(target)} is ${status} (${Math.round(outcome.elapsedMs)}ms)`
  return outcome.reason !== undefined ? `${timing}: ${outcome.reason}` : timing
}

/**
 * Logs each outcome as it arrives and keeps a per-host tally for the end of the run
 */
export function createReporter(logger: Logger, options: { verbose: boolean }): Reporter {
  const summary = new ScanSummary()

  return {
    report(outcome) {
      summary.record(outcome)
      logger.info(formatOutcome(outcome, options.verbose))
    },

    finish() {
      for (const host of summary.entries()) {
        logger.info(`${host.address}: ${formatHostStatus(host)}`)
      }

      const counts = summary.counts()
      logger.info(`Scanned ${counts.total} ports: ${counts.open} open, ${counts.closed} closed, ${counts.errored} errored`)
      return counts
    },
  }
}
