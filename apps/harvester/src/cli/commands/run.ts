import { writeFile } from 'node:fs/promises'
import type { ILogger } from '@carlistings/logger'
import { loggers } from '../../config/logger.js'
import type { Settings } from '../../config/settings.js'
import { ValidationError } from '../../errors.js'
import { brandUrl } from '../../utils/url.js'
import type { RunResult } from '../../types.js'
import { createRunContext, type OwnedRunContext } from '../../workflow/context.js'
import { WorkflowOrchestrator } from '../../workflow/orchestrator.js'

const log = loggers.cli

export interface RunCommandArgs {
  /** Defaults to the configured cars listing page */
  url?: string
  maxPages?: number
  maxItems?: number
  noImages: boolean
  output?: string
}

export interface RunCommandDeps {
  settings: Settings
  createContext?: (settings: Settings, log: ILogger) => Promise<OwnedRunContext>
  writeOutput?: (path: string, contents: string) => Promise<void>
  print?: (line: string) => void
  signal?: AbortSignal
}

export function summarize(result: RunResult): string[] {
  const { stats } = result
  const lines = [
    `Run ${result.success ? 'succeeded' : 'failed'}${result.cancelled ? ' (cancelled)' : ''}`,
    `  discovered: ${stats.discovered}`,
    `  scraped:    ${stats.scraped}`,
    `  persisted:  ${stats.persisted} (${stats.duplicates} already stored)`,
    `  users:      ${stats.linked} linked, ${stats.usersCreated} created`,
    `  images:     ${stats.assetsMigrated} migrated`,
    `  errors:     ${stats.errors}`,
  ]
  for (const error of result.errors) {
    lines.push(`  - ${error}`)
  }
  return lines
}

export async function runRunCommand(args: RunCommandArgs, deps: RunCommandDeps): Promise<number> {
  const print = deps.print ?? console.log
  if (Number.isNaN(args.maxPages) || Number.isNaN(args.maxItems)) {
    log.error('--max-pages and --max-items must be positive integers')
    return 2
  }

  const makeContext = deps.createContext ?? createRunContext
  const context = await makeContext(deps.settings, loggers.workflow)

  let result: RunResult
  try {
    result = await new WorkflowOrchestrator(context).run({
      pageUrl: args.url || deps.settings.urls.carsMain,
      maxPages: args.maxPages ?? deps.settings.harvest.maxPages,
      maxItems: args.maxItems ?? deps.settings.harvest.maxItems,
      migrateAssets: !args.noImages,
      signal: deps.signal,
    })
  } catch (error) {
    if (error instanceof ValidationError) {
      log.error('Invalid run input', { field: error.field }, error)
      return 2
    }
    throw error
  } finally {
    await context.close()
  }

  for (const line of summarize(result)) {
    print(line)
  }

  if (args.output) {
    const write = deps.writeOutput ?? ((path: string, contents: string) => writeFile(path, contents, 'utf-8'))
    await write(args.output, `${JSON.stringify(result, null, 2)}\n`)
    log.info('Run result written', { path: args.output })
  }

  return result.success ? 0 : 1
}

/**
 * Harvest one brand's listing pages.
 */
export async function runBrandCommand(
  args: Omit<RunCommandArgs, 'url'> & { brand: string },
  deps: RunCommandDeps
): Promise<number> {
  if (!args.brand.trim()) {
    log.error('Missing required flag --brand')
    return 2
  }
  const { brand, ...rest } = args
  return runRunCommand({ ...rest, url: brandUrl(brand, deps.settings.urls.brandTemplate) }, deps)
}
