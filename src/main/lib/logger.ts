/**
 * Logger
 *
 * Structured logging using electron-log (Node entry).
 * Provides scoped loggers for different parts of the library.
 */

import log from 'electron-log/node'
import { join } from 'node:path'
import { ENVIRONMENT } from 'shared/constants'
import { getLogsDir } from '../config/paths'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

let logsDir = getLogsDir()

log.transports.file.resolvePathFn = () => join(logsDir, 'keysheet.log')

// Tests never write a log file
log.transports.file.level = ENVIRONMENT.IS_TEST ? false : 'info'
log.transports.console.level = ENVIRONMENT.IS_DEV ? 'debug' : 'info'

log.transports.file.format =
  '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}'
log.transports.console.format = '[{level}] {scope} {text}'

// 10MB
log.transports.file.maxSize = 10 * 1024 * 1024

export const logger = {
  main: log.scope('main'),
  config: log.scope('config'),
  sheets: log.scope('sheets'),
  matcher: log.scope('matcher'),
  window: log.scope('window'),
  store: log.scope('store'),
}

/**
 * Apply runtime settings once configuration is known
 */
export function configureLogger(options: {
  level?: LogLevel
  logsDir?: string
}): void {
  if (options.level) {
    log.transports.console.level = options.level
  }
  if (options.logsDir) {
    logsDir = options.logsDir
  }
}

export { log }
