/**
 * Sanitizer
 *
 * Drops hidden sheets and sections left without bindings.
 */

import type { Sheet } from 'shared/sheet-types'

export function removeHiddenSheets(sheets: Sheet[]): Sheet[] {
  return sheets.filter(sheet => !sheet.hidden)
}

export function removeEmptySections(sheets: Sheet[]): Sheet[] {
  return sheets.map(sheet => ({
    ...sheet,
    section: Object.fromEntries(
      Object.entries(sheet.section).filter(
        ([, bindings]) => Object.keys(bindings).length > 0
      )
    ),
  }))
}

export function sanitizeSheets(sheets: Sheet[]): Sheet[] {
  return removeEmptySections(removeHiddenSheets(sheets))
}
