/**
 * Sheet Selection
 *
 * Decides which sheet a host shows: an explicitly requested sheet, the
 * best match for the focused window, the configured fallback sheet, or
 * the first sheet of the collection.
 */

import type { ActiveWindow, SheetCollection } from 'shared/sheet-types'
import { logger } from '../lib/logger'
import { findBestSheetId } from './matcher'
import { findSheetById, getSheetById } from './registry'

export type SelectionReason = 'explicit' | 'matched' | 'fallback' | 'first'

export interface SheetSelection {
  sheetId: string
  reason: SelectionReason
}

export interface SelectSheetOptions {
  /** Requested by the user; must exist */
  sheetId?: string
  window?: ActiveWindow
  fallbackSheetId?: string
}

export function selectSheetId(
  sheets: SheetCollection,
  options: SelectSheetOptions = {}
): SheetSelection | null {
  const { sheetId, window, fallbackSheetId } = options

  if (sheetId) {
    getSheetById(sheets, sheetId)
    logger.sheets.debug(`Using provided sheet-id: ${sheetId}`)
    return { sheetId, reason: 'explicit' }
  }

  if (window) {
    const matched = findBestSheetId(sheets, window.wmClass, window.windowTitle)
    if (matched) {
      logger.sheets.debug(`Found matching sheet: ${matched}`)
      return { sheetId: matched, reason: 'matched' }
    }
  }

  if (fallbackSheetId) {
    if (findSheetById(sheets, fallbackSheetId)) {
      logger.sheets.debug(`Using fallback sheet-id: ${fallbackSheetId}`)
      return { sheetId: fallbackSheetId, reason: 'fallback' }
    }
    logger.sheets.warn(`Fallback sheet '${fallbackSheetId}' does not exist`)
  }

  if (sheets.length === 0) return null

  logger.sheets.debug('No matching or fallback sheet found. Using first sheet.')
  return { sheetId: sheets[0].id, reason: 'first' }
}
