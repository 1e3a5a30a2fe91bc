import { createLogger } from '@brewlink/logger'

export const rootLogger = createLogger('syncer')

/**
 * Component loggers. Component paths show up as `component` in JSON output.
 */
export const logger = {
  worker: rootLogger.child('worker'),
  scheduler: rootLogger.child('scheduler'),
  sync: rootLogger.child('sync'),
  matcher: rootLogger.child('matcher'),
  links: rootLogger.child('links'),
  differ: rootLogger.child('differ'),
  retailer: rootLogger.child('adapters:retailer'),
  beerdb: rootLogger.child('adapters:beerdb'),
  fetch: rootLogger.child('fetch'),
  store: rootLogger.child('store'),
  api: rootLogger.child('api'),
}
