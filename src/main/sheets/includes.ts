/**
 * Include Expander
 *
 * Copies the sections of included sheets into the including sheet,
 * prefixed with the included sheet's id so titles never collide.
 */

import type { Sheet, SheetSections } from 'shared/sheet-types'
import { IncludeNotFoundError } from '../lib/errors'
import { cloneSections } from './clone'

export function formatIncludedSectionTitle(
  includedId: string,
  title: string
): string {
  return `[${includedId}] ${title}`
}

/**
 * Expand `include` lists in place and return the sheets
 * Include targets are read as merged but before their own expansion, so
 * the result does not depend on sheet order. Hidden sheets can be
 * included.
 */
export function expandIncludes(sheets: Sheet[]): Sheet[] {
  const merged = new Map<string, SheetSections>()
  for (const sheet of sheets) {
    if (!merged.has(sheet.id)) {
      merged.set(sheet.id, cloneSections(sheet.section))
    }
  }

  for (const sheet of sheets) {
    for (const includeId of sheet.include) {
      const sections = merged.get(includeId)
      if (!sections) {
        throw new IncludeNotFoundError(includeId, sheet.id)
      }
      for (const [title, bindings] of Object.entries(sections)) {
        sheet.section[formatIncludedSectionTitle(includeId, title)] = {
          ...bindings,
        }
      }
    }
  }

  return sheets
}
