/**
 * keysheet
 *
 * Cheatsheet resolution for the focused desktop window: loads bundled
 * and user sheets, merges and expands them, and picks the best match.
 *
 * @example
 * import { SheetStore, resolveActiveSheet, initializeConfig } from 'keysheet'
 *
 * initializeConfig()
 * const store = new SheetStore()
 * const active = await resolveActiveSheet({ store })
 */

export * from './sheets'
export * from './lib'
export {
  initializeConfig,
  getConfig,
  resetConfig,
  validateMainEnv,
  getUserConfigDir,
  getBundledSheetsDir,
  type MainConfig,
  type MainEnvVars,
} from './config'
export {
  createLinuxWindowDetector,
  isUsingWayland,
  parseActiveWindowId,
  parseGdbusEvalResult,
  parseXpropWindow,
  type CommandRunner,
  type LinuxWindowDetectorOptions,
  type WindowDetector,
} from './window/active-window'
export {
  resolveActiveSheet,
  type ActiveSheet,
  type ResolveActiveSheetOptions,
} from './window/resolve-active-sheet'
export type * from 'shared/sheet-types'
