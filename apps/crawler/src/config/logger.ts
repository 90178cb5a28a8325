import { createLogger } from '@homescan/logger'

export const rootLogger = createLogger('crawler')

/** Component loggers, one per crawl stage */
export const loggers = {
  cli: rootLogger.child('cli'),
  crawl: rootLogger.child('crawl'),
  walker: rootLogger.child('walker'),
  scheduler: rootLogger.child('scheduler'),
  fetch: rootLogger.child('fetch'),
  extract: rootLogger.child('extract'),
  export: rootLogger.child('export'),
}
