import { ScanError } from '../errors.js'
import type { PortSet } from './ports.js'

/**
 * One probe unit
 */
export interface ScanTarget {
  readonly address: string
  readonly port: number
}

/**
 * Build the work set: every address crossed with every port.
 * Addresses in input order, ports ascending within each address.
 * Throws NoTargets immediately if either side is empty; targets themselves are yielded lazily.
 */
export function expandTargets(addresses: readonly string[], ports: PortSet): Generator<ScanTarget> {
  if (addresses.length === 0) {
    throw new ScanError('NoTargets', 'No addresses to scan')
  }
  if (ports.length === 0) {
    throw new ScanError('NoTargets', 'No ports to scan')
  }

  return generateTargets(addresses, ports)
}

function* generateTargets(addresses: readonly string[], ports: PortSet): Generator<ScanTarget> {
  for (const address of addresses) {
    for (const port of ports) {
      yield { address, port }
    }
  }
}

export function countTargets(addresses: readonly string[], ports: PortSet): number {
  return addresses.length * ports.length
}

/**
 * host:port label, bracketing IPv6 literals
 */
export function formatTarget({ address, port }: ScanTarget): string {
  return address.includes(':') ? `[${address}]:${port}` : `${address}:${port}`
}
