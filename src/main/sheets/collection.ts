/**
 * Sheet Collection
 *
 * Runs loader -> merger -> include expander -> sanitizer and hands out
 * the result as a frozen snapshot. SheetStore swaps snapshots on reload.
 */

import type {
  Sheet,
  SheetCollection,
  SheetOverride,
} from 'shared/sheet-types'
import { initializeConfig } from '../config'
import { logger } from '../lib/logger'
import { expandIncludes } from './includes'
import { loadDefaultSheets, loadUserSheets } from './loader'
import { findBestSheetId } from './matcher'
import { mergeSheets } from './merger'
import { findSheetById, getSheetById } from './registry'
import { sanitizeSheets } from './sanitizer'

export interface LoadSheetsOptions {
  /** Directory of default sheets (bundled sheets when omitted) */
  sheetsDir?: string
  /** Directory of user sheets (config folder when omitted) */
  userSheetsDir?: string
}

function freezeSheet(sheet: Sheet): Readonly<Sheet> {
  for (const bindings of Object.values(sheet.section)) {
    Object.freeze(bindings)
  }
  Object.freeze(sheet.section)
  Object.freeze(sheet.match)
  Object.freeze(sheet.include)
  return Object.freeze(sheet)
}

/**
 * Build a collection from already loaded sheets
 * Throws IncludeNotFoundError when an include cannot be resolved.
 */
export function createSheetCollection(
  defaults: readonly Readonly<Sheet>[],
  overrides: readonly SheetOverride[] = []
): SheetCollection {
  const merged = mergeSheets(defaults, overrides)
  const expanded = expandIncludes(merged)
  const sanitized = sanitizeSheets(expanded)
  return Object.freeze(sanitized.map(freezeSheet))
}

/**
 * Load default and user sheets from disk into a collection
 */
export function loadSheets(options: LoadSheetsOptions = {}): SheetCollection {
  let { sheetsDir, userSheetsDir } = options
  if (sheetsDir === undefined || userSheetsDir === undefined) {
    const { paths } = initializeConfig()
    sheetsDir ??= paths.sheets
    userSheetsDir ??= paths.userSheets
  }

  const sheets = createSheetCollection(
    loadDefaultSheets(sheetsDir),
    loadUserSheets(userSheetsDir)
  )
  logger.sheets.debug(`Loaded ${sheets.length} sheets.`)
  return sheets
}

/**
 * Holds the current collection for the host application
 * A failed reload keeps the previous snapshot.
 */
export class SheetStore {
  private current: SheetCollection

  constructor(
    private readonly load: () => SheetCollection = () => loadSheets()
  ) {
    this.current = load()
  }

  get sheets(): SheetCollection {
    return this.current
  }

  reload(): SheetCollection {
    const next = this.load()
    this.current = next
    logger.sheets.info(`Reloaded ${next.length} sheets`)
    return next
  }

  getSheet(sheetId: string): Readonly<Sheet> {
    return getSheetById(this.current, sheetId)
  }

  findSheet(sheetId: string): Readonly<Sheet> | undefined {
    return findSheetById(this.current, sheetId)
  }

  findBestSheetId(wmClass: string, windowTitle: string): string | null {
    return findBestSheetId(this.current, wmClass, windowTitle)
  }
}
