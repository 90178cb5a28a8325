import '../env.js'
import { loggers } from '../config/logger.js'
import { classifyError } from '../crawler/errors.js'
import { runCrawlCommand } from './commands/crawl.js'
import { runSitesCommand } from './commands/sites.js'
import { parseFlags, UsageError } from './parse-flags.js'

const BOOLEAN_FLAGS = new Set(['verbose', 'help'])

function printHelp(): void {
  console.log('Listing crawler')
  console.log('')
  console.log('Commands:')
  console.log('  crawl [--site centanet|28hse|ricacorp|all] [--max-pages N] [--max-properties N]')
  console.log('        [--category buy|rent] [--region NAME] [--output-dir DIR] [--verbose]')
  console.log('  sites')
}

async function main(): Promise<number> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    return command ? 0 : 2
  }

  const flags = parseFlags(rest, BOOLEAN_FLAGS)
  if (flags.help === true) {
    printHelp()
    return 0
  }

  switch (command) {
    case 'crawl':
      return runCrawlCommand(flags)
    case 'sites':
      return runSitesCommand()
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      return 2
  }
}

main().then(
  exitCode => process.exit(exitCode),
  (error: unknown) => {
    if (error instanceof UsageError) {
      console.error(error.message)
      process.exit(error.exitCode)
    }
    const classified = classifyError(error)
    loggers.cli.fatal('Crawler failed', { category: classified.category, code: classified.code }, error)
    process.exit(classified.category === 'config' ? 2 : 1)
  }
)
