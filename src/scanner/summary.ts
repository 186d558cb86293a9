import { formatPortRanges } from './ports.js'
import type { ProbeOutcome, ProbeStatus } from './probe.js'

export interface HostStatus {
  address: string
  open: number[]
  closed: number[]
  errored: number[]
}

export type StatusCounts = Record<ProbeStatus, number> & { total: number }

/**
 * Per-address tally of a scan's outcomes
 */
export class ScanSummary {
  private hosts = new Map<string, HostStatus>()

  record(outcome: ProbeOutcome): void {
    const { address, port } = outcome.target
    let host = this.hosts.get(address)
    if (!host) {
      host = { address, open: [], closed: [], errored: [] }
      this.hosts.set(address, host)
    }
    host[outcome.status].push(port)
  }

  /**
   * Hosts in first-seen order, ports sorted
   */
  entries(): HostStatus[] {
    const byPort = (a: number, b: number) => a - b
    return [...this.hosts.values()].map(host => ({
      address: host.address,
      open: [...host.open].sort(byPort),
      closed: [...host.closed].sort(byPort),
      errored: [...host.errored].sort(byPort),
    }))
  }

  counts(): StatusCounts {
    const counts: StatusCounts = { open: 0, closed: 0, errored: 0, total: 0 }
    for (const host of this.hosts.values()) {
      counts.open += host.open.length
      counts.closed += host.closed.length
      counts.errored += host.errored.length
    }
    counts.total = counts.open + counts.closed + counts.errored
    return counts
  }
}

export function formatHostStatus(host: HostStatus): string {
  return [
    `open: ${formatPortRanges(host.open)}`,
    `closed: ${formatPortRanges(host.closed)}`,
    `errored: ${formatPortRanges(host.errored)}`,
  ].join('; ')
}
