import net from 'node:net'
import { Writable } from 'node:stream'
import winston from 'winston'
import type { Logger } from '../src/utils/logger.js'

export interface CapturedLogger {
  logger: Logger
  lines: string[]
  /** Wait for winston to hand queued entries to the transport */
  flush(): Promise<void>
}

export function createCaptureLogger(level = 'debug'): CapturedLogger {
  const lines: string[] = []
  const stream = new Writable({
    objectMode: true,
    write(info: { level: string; message: unknown }, _encoding, callback) {
      lines.push(`${info.level}: ${String(info.message)}`)
      callback()
    },
  })

  const logger = winston.createLogger({
    level,
    transports: [new winston.transports.Stream({ stream })],
  })

  return {
    logger,
    lines,
    flush: () => new Promise(resolve => setTimeout(resolve, 20)),
  }
}

/**
 * Start a listener on an ephemeral loopback port
 */
export async function listen(): Promise<{ server: net.Server; port: number }> {
  const server = net.createServer(socket => socket.destroy())
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject)
    server.listen(0, '127.0.0.1', () => resolve())
  })

  const address = server.address()
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address')
  }
  return { server, port: address.port }
}

/**
 * A loopback port with nothing listening on it
 */
export async function unusedPort(): Promise<number> {
  const { server, port } = await listen()
  await close(server)
  return port
}

export function close(server: net.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()))
  })
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}
