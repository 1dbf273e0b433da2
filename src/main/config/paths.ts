/**
 * Path Resolution
 *
 * Locations of bundled sheets and of the user's configuration folder.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { APP_FOLDER } from 'shared/constants'

/**
 * Root of the user's configuration (XDG_CONFIG_HOME or ~/.config)
 */
export function getUserConfigRoot(
  env: NodeJS.ProcessEnv = process.env
): string {
  const xdgConfig = env.XDG_CONFIG_HOME
  if (xdgConfig) return xdgConfig
  return join(env.HOME || homedir(), '.config')
}

/**
 * Application folder inside the user's configuration root
 */
export function getUserConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return join(getUserConfigRoot(env), APP_FOLDER)
}

/**
 * Sheets shipped with the package
 */
export function getBundledSheetsDir(): string {
  return fileURLToPath(new URL('../../../resources/sheets', import.meta.url))
}

export function getLogsDir(env: NodeJS.ProcessEnv = process.env): string {
  return join(getUserConfigDir(env), 'logs')
}
