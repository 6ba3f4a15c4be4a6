#!/usr/bin/env node
import '../env.js'

import { loggers } from '../config/logger.js'
import { loadSettings } from '../config/settings.js'
import { runEnqueueCommand } from './commands/enqueue.js'
import { runBrandCommand, runRunCommand } from './commands/run.js'
import { runWorkerCommand } from './commands/worker.js'
import { asPositiveInt, asString, parseFlags } from './parse-flags.js'

const log = loggers.cli

function printHelp(): void {
  console.log('Listing harvester CLI')
  console.log('')
  console.log('Commands:')
  console.log('  run [--url <url>] [--max-pages N] [--max-items N] [--no-images] [--output <file.json>]')
  console.log('  brand --brand <name> [--max-pages N] [--max-items N] [--no-images] [--output <file.json>]')
  console.log('  enqueue [--url <url>] [--max-pages N] [--max-items N] [--no-images]')
  console.log('  worker [--concurrency N]')
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    process.exit(0)
  }

  const settings = loadSettings()
  const controller = new AbortController()
  process.once('SIGINT', () => {
    log.warn('Interrupted, stopping after the current item')
    controller.abort()
  })

  const common = {
    maxPages: asPositiveInt(flags['max-pages']),
    maxItems: asPositiveInt(flags['max-items']),
    noImages: flags['no-images'] === true,
  }

  let exitCode = 2

  switch (command) {
    case 'run':
      exitCode = await runRunCommand(
        { ...common, url: asString(flags.url) || undefined, output: asString(flags.output) || undefined },
        { settings, signal: controller.signal }
      )
      break
    case 'brand':
      exitCode = await runBrandCommand(
        { ...common, brand: asString(flags.brand), output: asString(flags.output) || undefined },
        { settings, signal: controller.signal }
      )
      break
    case 'enqueue':
      exitCode = await runEnqueueCommand({ ...common, url: asString(flags.url) || undefined }, { settings })
      break
    case 'worker':
      exitCode = await runWorkerCommand(settings, asPositiveInt(flags.concurrency))
      break
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = 2
  }

  process.exit(exitCode)
}

main().catch(error => {
  log.fatal('Command failed', {}, error)
  process.exit(1)
})
