/**
 * Sheet Merger
 *
 * Overlays user sheets onto the default sheets by id. A user sheet with
 * a known id extends the default one; any other user sheet is appended.
 */

import type { Sheet, SheetOverride } from 'shared/sheet-types'
import { SheetValidationError } from '../lib/errors'
import { logger } from '../lib/logger'
import { cloneSections, cloneSheet } from './clone'

function applyOverride(sheet: Sheet, override: SheetOverride): void {
  const { section = {}, match = {}, ...fields } = override

  // Section titles are replaced as a whole, other titles are kept
  Object.assign(sheet.section, cloneSections(section))
  Object.assign(sheet.match, match)
  Object.assign(sheet, fields)
  if (fields.include) sheet.include = [...fields.include]
}

function createSheet(override: SheetOverride): Sheet {
  const { regexWmclass, regexTitle } = override.match ?? {}
  if (regexWmclass === undefined || regexTitle === undefined) {
    throw new SheetValidationError(override.source ?? override.id, [
      `sheet '${override.id}' does not extend a default sheet and needs match.regex_wmclass and match.regex_title`,
    ])
  }

  const sheet: Sheet = {
    id: override.id,
    url: override.url ?? '',
    hidden: override.hidden ?? false,
    include: [...(override.include ?? [])],
    match: { regexWmclass, regexTitle },
    section: cloneSections(override.section ?? {}),
  }
  if (override.title !== undefined) sheet.title = override.title
  if (override.source !== undefined) sheet.source = override.source
  return sheet
}

/**
 * Merge user sheets into the default sheets
 * Inputs are left untouched; the returned list is the merged collection.
 */
export function mergeSheets(
  defaults: readonly Readonly<Sheet>[],
  overrides: readonly SheetOverride[]
): Sheet[] {
  const sheets = defaults.map(cloneSheet)

  for (const override of overrides) {
    const existing = sheets.find(sheet => sheet.id === override.id)
    if (existing) {
      applyOverride(existing, override)
      logger.sheets.debug(`Updated sheet '${override.id}' from user sheet`)
      continue
    }

    try {
      sheets.push(createSheet(override))
    } catch (error) {
      if (!(error instanceof SheetValidationError)) throw error
      logger.sheets.warn(error.message)
    }
  }

  return sheets
}
