import { createLogger } from '@carlistings/logger'

export const logger = createLogger('harvester')

/** Plumbing loggers. Pipeline stages log through children of `workflow`. */
export const loggers = {
  fetch: logger.child('fetch'),
  workflow: logger.child('workflow'),
  metrics: logger.child('metrics'),
  queue: logger.child('queue'),
  redis: logger.child('redis'),
  db: logger.child('db'),
  cli: logger.child('cli'),
  config: logger.child('config'),
}
