#!/usr/bin/env node
import { hideBin } from 'yargs/helpers'
import { run } from './cli.js'

const controller = new AbortController()
const stop = () => controller.abort()

process.once('SIGINT', stop)
process.once('SIGTERM', stop)

process.exitCode = await run(hideBin(process.argv), { signal: controller.signal })

process.off('SIGINT', stop)
process.off('SIGTERM', stop)
