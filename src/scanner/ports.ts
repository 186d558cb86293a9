import { ScanError } from '../errors.js'

export const MIN_PORT = 1
export const MAX_PORT = 65535

/**
 * Inclusive port range. A bare port `p` is `{ start: p, end: p }`.
 */
export interface PortRange {
  start: number
  end: number
}

/**
 * Ascending, duplicate-free list of ports in [1, 65535]
 */
export type PortSet = readonly number[]

const SINGLE_PORT = /^\d+$/
const PORT_RANGE = /^(\d+)-(\d+)$/

function checkBounds(port: number, token: string): number {
  if (port < MIN_PORT || port > MAX_PORT) {
    throw new ScanError(
      'PortOutOfBounds',
      `Port ${port} in "${token}" is outside ${MIN_PORT}-${MAX_PORT}`,
      token
    )
  }
  return port
}

/**
 * Parse one token of a port spec: either "80" or "20-22"
 */
export function parsePortRange(raw: string): PortRange {
  const token = raw.trim()

  if (SINGLE_PORT.test(token)) {
    const port = checkBounds(parseInt(token, 10), token)
    return { start: port, end: port }
  }

  const match = PORT_RANGE.exec(token)
  if (!match) {
    throw new ScanError('InvalidPortToken', `Invalid port token: "${raw}"`, raw)
  }

  const start = checkBounds(parseInt(match[1], 10), token)
  const end = checkBounds(parseInt(match[2], 10), token)

  if (start > end) {
    throw new ScanError(
      'InvalidRange',
      `Invalid port range "${token}": ${start} is greater than ${end}`,
      token
    )
  }

  return { start, end }
}

/**
 * Merge overlapping or adjacent ranges. Input order does not matter.
 */
export function mergeRanges(ranges: PortRange[]): PortRange[] {
  const sorted = [...ranges].sort((a, b) => a.start - b.start || a.end - b.end)
  const merged: PortRange[] = []

  for (const range of sorted) {
    const last = merged[merged.length - 1]
    if (last && range.start <= last.end + 1) {
      last.end = Math.max(last.end, range.end)
    } else {
      merged.push({ ...range })
    }
  }

  return merged
}

/**
 * Parse a comma-separated port spec such as "22,80,8000-8100" into a PortSet.
 * The first bad token fails the whole spec.
 */
export function parsePorts(spec: string): PortSet {
  const ranges = spec.split(',').map(parsePortRange)
  const ports: number[] = []

  for (const { start, end } of mergeRanges(ranges)) {
    for (let port = start; port <= end; port++) {
      ports.push(port)
    }
  }

  return ports
}

/**
 * Render ascending ports compactly, collapsing consecutive runs: "20-22,80"
 */
export function formatPortRanges(ports: readonly number[]): string {
  if (ports.length === 0) {
    return 'none'
  }

  const parts: string[] = []
  let runStart = ports[0]
  let prev = ports[0]

  for (const port of ports.slice(1)) {
    if (port !== prev + 1) {
      parts.push(runStart === prev ? `${prev}` : `${runStart}-${prev}`)
      runStart = port
    }
    prev = port
  }
  parts.push(runStart === prev ? `${prev}` : `${runStart}-${prev}`)

  return parts.join(',')
}
