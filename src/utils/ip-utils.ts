import { isIP } from 'net'
import { ScanError } from '../errors.js'

/**
 * Addresses scanned when none are given
 */
export const DEFAULT_ADDRESSES: readonly string[] = ['127.0.0.1']

// Larger blocks would make the work set unmanageable
const MIN_CIDR_PREFIX = 16

/**
 * Parse CIDR notation to get list of IP addresses
 */
export function parseCidr(cidr: string): string[] {
  const segments = cidr.split('/')
  if (segments.length !== 2) {
    throw new ScanError('InvalidAddress', `Invalid CIDR block "${cidr}"`, cidr)
  }

  const [ip, prefixStr] = segments
  const prefix = /^\d+$/.test(prefixStr ?? '') ? parseInt(prefixStr, 10) : NaN

  if (isNaN(prefix) || prefix < 0 || prefix > 32) {
    throw new ScanError('InvalidAddress', `Invalid CIDR prefix in "${cidr}"`, cidr)
  }

  if (isIP(ip) !== 4) {
    throw new ScanError('InvalidAddress', `Invalid IPv4 address in "${cidr}"`, cidr)
  }

  const ipNum = ipToNum(ip)
  const mask = prefix === 0 ? 0 : (~0 << (32 - prefix)) >>> 0
  const networkAddr = (ipNum & mask) >>> 0
  const broadcastAddr = (networkAddr | ~mask) >>> 0

  const ips: string[] = []

  // Skip network and broadcast addresses except on /31 and /32
  const start = prefix >= 31 ? networkAddr : networkAddr + 1
  const end = prefix >= 31 ? broadcastAddr : broadcastAddr - 1

  for (let i = start; i <= end; i++) {
    ips.push(numToIp(i))
  }

  return ips
}

/**
 * Convert number to IP address string
 */
function numToIp(num: number): string {
  return [
    (num >>> 24) & 255,
    (num >>> 16) & 255,
    (num >>> 8) & 255,
    num & 255,
  ].join('.')
}

/**
 * Convert IP address string to number
 */
export function ipToNum(ip: string): number {
  const parts = ip.split('.').map(p => parseInt(p, 10))
  return ((parts[0] << 24) | (parts[1] << 16) | (parts[2] << 8) | parts[3]) >>> 0
}

/**
 * Canonical spelling of an IP literal so that equal addresses compare equal.
 * IPv6 is compressed and lower-cased; a zone suffix (`%eth0`) is kept as given.
 */
export function normalizeAddress(literal: string): string {
  if (isIP(literal) !== 6) {
    return literal
  }

  const zoneAt = literal.indexOf('%')
  const address = zoneAt === -1 ? literal : literal.slice(0, zoneAt)
  const zone = zoneAt === -1 ? '' : literal.slice(zoneAt)

  const host = new URL(`http://[${address}]`).hostname
  return `${host.slice(1, -1)}${zone}`
}

/**
 * Resolve address literals and IPv4 CIDR blocks into the ordered, duplicate-free list
 * of addresses to scan. An empty list resolves to DEFAULT_ADDRESSES.
 */
export function resolveAddresses(raw: readonly string[]): string[] {
  if (raw.length === 0) {
    return [...DEFAULT_ADDRESSES]
  }

  const seen = new Set<string>()
  const resolved: string[] = []

  const add = (address: string) => {
    if (!seen.has(address)) {
      seen.add(address)
      resolved.push(address)
    }
  }

  for (const entry of raw) {
    const literal = entry.trim()

    if (literal.includes('/')) {
      const prefix = parseInt(literal.split('/')[1], 10)
      if (prefix < MIN_CIDR_PREFIX) {
        throw new ScanError(
          'InvalidAddress',
          `CIDR block "${literal}" is too large (smallest allowed prefix is /${MIN_CIDR_PREFIX})`,
          literal
        )
      }
      parseCidr(literal).forEach(add)
      continue
    }

    if (isIP(literal) === 0) {
      throw new ScanError('InvalidAddress', `Invalid IP address: "${entry}"`, entry)
    }
    add(normalizeAddress(literal))
  }

  return resolved
}
