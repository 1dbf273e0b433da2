/**
 * Sheet Registry
 *
 * Lookup of sheets by id within a loaded collection.
 */

import type { Sheet } from 'shared/sheet-types'
import { SheetNotFoundError } from '../lib/errors'

export function findSheetById<T extends Pick<Sheet, 'id'>>(
  sheets: readonly T[],
  sheetId: string
): T | undefined {
  return sheets.find(sheet => sheet.id === sheetId)
}

/**
 * Get a sheet by id (throws SheetNotFoundError)
 */
export function getSheetById<T extends Pick<Sheet, 'id'>>(
  sheets: readonly T[],
  sheetId: string
): T {
  const sheet = findSheetById(sheets, sheetId)
  if (!sheet) {
    throw new SheetNotFoundError(sheetId)
  }
  return sheet
}

export function listSheetIds(sheets: readonly Pick<Sheet, 'id'>[]): string[] {
  return sheets.map(sheet => sheet.id)
}
