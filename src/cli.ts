import yargs from 'yargs'
import { loadConfig, createScanConfig, type Config } from './config.js'
import { ScanError, isScanError } from './errors.js'
import { createReporter } from './report/reporter.js'
import { scan, type ProbeFn } from './scanner/executor.js'
import { filterResponsive, type PingExec } from './scanner/ping.js'
import { parsePorts } from './scanner/ports.js'
import { countTargets, expandTargets } from './scanner/targets.js'
import { resolveAddresses } from './utils/ip-utils.js'
import { createLogger, type Logger } from './utils/logger.js'
import { PRODUCT_NAME, VERSION } from './utils/version.js'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2
export const EXIT_INTERRUPTED = 130

export interface CliArgs {
  ports: string
  addrs: string[]
  verbose: boolean
  timeout: number
  concurrency: number
  ping: boolean
  logDir?: string
}

/**
 * Parse command-line arguments. `defaults` come from the environment.
 * Usage errors are thrown as ScanError('InvalidConfig'); --help and --version are
 * handled by yargs itself.
 */
export function parseCli(argv: string[], defaults: Config): CliArgs {
  const args = yargs(argv)
    .scriptName(PRODUCT_NAME)
    .usage('$0 <ports> [addrs..]\n\nCheck which TCP ports accept connections on one or more hosts.')
    .parserConfiguration({ 'parse-positional-numbers': false })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      default: false,
      describe: 'Log timings, error reasons and scan progress',
    })
    .option('timeout', {
      alias: 't',
      type: 'number',
      default: defaults.timeoutMs,
      describe: 'Per-connection timeout in milliseconds',
    })
    .option('concurrency', {
      alias: 'c',
      type: 'number',
      default: defaults.concurrency,
      describe: 'Maximum connection attempts in flight',
    })
    .option('ping', {
      type: 'boolean',
      default: false,
      describe: 'Skip hosts that do not answer a ping',
    })
    .option('log-dir', {
      type: 'string',
      default: defaults.logDir,
      describe: 'Also write rotating log files to this directory',
    })
    .example('$0 22,80,443 192.168.1.10', 'Three ports on one host')
    .example('$0 1-1024 10.0.0.0/24 -t 300', 'Well-known ports across a subnet')
    .demandCommand(1, 'Missing <ports>')
    .version(VERSION)
    .alias('version', 'V')
    .help()
    .alias('help', 'h')
    .strict()
    .fail((message: string | undefined, err: Error | undefined) => {
      throw err ?? new ScanError('InvalidConfig', message ?? 'Invalid arguments')
    })
    .parseSync()

  const [ports, ...addrs] = args._.map(String)

  return {
    ports,
    addrs,
    verbose: args.verbose,
    timeout: args.timeout,
    concurrency: args.concurrency,
    ping: args.ping,
    logDir: args['log-dir'],
  }
}

export interface RunOptions {
  env?: NodeJS.ProcessEnv
  logger?: Logger
  /** Aborted on SIGINT/SIGTERM */
  signal?: AbortSignal
  probe?: ProbeFn
  pingExec?: PingExec
}

/**
 * Parse, validate, scan and report. Resolves the process exit code.
 */
export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
  const { env = process.env, signal, probe, pingExec } = options
  let logger = options.logger

  try {
    const defaults = loadConfig(env)
    const args = parseCli(argv, defaults)
    const config = createScanConfig({
      timeoutMs: args.timeout,
      verbose: args.verbose,
      concurrency: args.concurrency,
    })

    logger ??= createLogger({ level: config.verbose ? 'debug' : defaults.logLevel, logDir: args.logDir })
    if (config.verbose) {
      logger.warn('Verbose mode ON')
    }

    // Validate every input before touching the network
    const ports = parsePorts(args.ports)
    let addresses = resolveAddresses(args.addrs)

    if (args.ping) {
      addresses = await filterResponsive(addresses, logger, { timeoutMs: config.timeoutMs, exec: pingExec, signal })
      if (signal?.aborted) {
        return EXIT_INTERRUPTED
      }
    }

    const targets = expandTargets(addresses, ports)
    const total = countTargets(addresses, ports)
    logger.info(`Scanning ${ports.length} ports on ${addresses.length} hosts (${total} targets)`)

    const reporter = createReporter(logger, config)
    for await (const outcome of scan(targets, config, { logger, signal, probe, total })) {
      reporter.report(outcome)
    }
    reporter.finish()

    return signal?.aborted ? EXIT_INTERRUPTED : EXIT_OK
  } catch (err) {
    logger ??= createLogger()

    if (isScanError(err)) {
      logger.error(err.message)
      return EXIT_USAGE
    }

    logger.error(err instanceof Error ? err : String(err))
    return EXIT_FAILURE
  }
}
