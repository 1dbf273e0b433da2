/**
 * Main Configuration
 *
 * Initializes and exports the runtime configuration: environment,
 * sheet directories and settings read from environment variables.
 */

import { createEnvConfig, type Environment } from 'shared/config'
import { ConfigNotInitializedError } from '../lib/errors'
import { configureLogger, logger } from '../lib/logger'
import { validateMainEnv } from './env'
import {
  getBundledSheetsDir,
  getLogsDir,
  getUserConfigDir,
} from './paths'

export interface MainConfig {
  // Environment
  env: Environment
  isDev: boolean
  isProd: boolean

  // App info
  appName: string
  appVersion: string

  // Platform
  platform: NodeJS.Platform

  // Paths
  paths: {
    /** Bundled default sheets */
    sheets: string
    /** User sheets overriding or extending the defaults */
    userSheets: string
    config: string
    logs: string
  }

  // Runtime settings
  settings: {
    logLevel: 'debug' | 'info' | 'warn' | 'error'
    detectTimeout: number
  }
}

let config: MainConfig | null = null

/**
 * Initialize configuration from the process environment
 * Later calls return the first result until resetConfig()
 */
export function initializeConfig(
  env: NodeJS.ProcessEnv = process.env
): MainConfig {
  if (config) return config

  const baseConfig = createEnvConfig(env)
  const envVars = validateMainEnv(baseConfig.isDev, env)
  const configDir = getUserConfigDir(env)

  config = {
    env: baseConfig.env,
    isDev: baseConfig.isDev,
    isProd: baseConfig.isProd,

    appName: baseConfig.appName,
    appVersion: baseConfig.appVersion,

    platform: process.platform,

    paths: {
      sheets: envVars.sheetsDir ?? getBundledSheetsDir(),
      userSheets: envVars.userSheetsDir ?? configDir,
      config: configDir,
      logs: getLogsDir(env),
    },

    settings: {
      logLevel: envVars.logLevel,
      detectTimeout: envVars.detectTimeout,
    },
  }

  configureLogger({ level: config.settings.logLevel, logsDir: config.paths.logs })
  logger.config.debug(
    `Sheets: ${config.paths.sheets}, user sheets: ${config.paths.userSheets}`
  )

  return config
}

/**
 * Get current configuration (throws if not initialized)
 */
export function getConfig(): MainConfig {
  if (!config) {
    throw new ConfigNotInitializedError()
  }
  return config
}

export function resetConfig(): void {
  config = null
}

export { validateMainEnv, type MainEnvVars } from './env'
export {
  getUserConfigRoot,
  getUserConfigDir,
  getBundledSheetsDir,
  getLogsDir,
} from './paths'
