/**
 * Error Handler
 *
 * Process-wide handlers for errors that escape the host application.
 */

import { logger } from './logger'

let installed = false

function logUnhandled(error: unknown): void {
  if (error instanceof Error) {
    logger.main.error('Unhandled error:', error.message)
    logger.main.error('Stack:', error.stack)
    return
  }
  logger.main.error('Unhandled rejection:', String(error))
}

/**
 * Setup global error handling
 * Should be called early in the host's lifecycle. Returns a function
 * that removes the handlers again.
 */
export function setupErrorHandling(): () => void {
  if (installed) return () => {}

  const onException = (error: Error) => {
    logUnhandled(error)
    process.exit(1)
  }
  const onRejection = (reason: unknown) => {
    logUnhandled(reason)
  }

  process.on('uncaughtException', onException)
  process.on('unhandledRejection', onRejection)
  installed = true

  logger.main.info('Global error handling initialized')

  return () => {
    process.off('uncaughtException', onException)
    process.off('unhandledRejection', onRejection)
    installed = false
  }
}
