import winston from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'
import path from 'path'

export type Logger = winston.Logger

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack }) => {
    const msg = stack || message
    return `${timestamp} [${level.toUpperCase()}] ${msg}`
  })
)

const consoleFormat = winston.format.combine(
  winston.format.errors({ stack: true }),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ level, message, timestamp }) => {
    return `${timestamp} ${level}: ${message}`
  })
)

export interface LoggerOptions {
  level?: string
  /** Write rotating log files here as well as to the console */
  logDir?: string
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', logDir } = options

  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ]

  if (logDir) {
    transports.push(
      new DailyRotateFile({
        dirname: getLogDirectory(logDir),
        filename: 'portsweep-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxSize: '10m',
        maxFiles: '7d',
        format: logFormat,
        zippedArchive: true,
      })
    )
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    exitOnError: false,
  })
}

/**
 * Resolve the log directory, defaulting to ./logs
 */
export function getLogDirectory(customDir?: string): string {
  if (customDir) {
    return path.resolve(customDir)
  }
  return path.resolve(process.cwd(), 'logs')
}
