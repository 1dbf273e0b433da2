/**
 * Active Sheet Resolution
 *
 * Detects the focused window and selects the sheet to show for it.
 */

import type { ActiveWindow, Sheet } from 'shared/sheet-types'
import { initializeConfig } from '../config'
import { getFallbackCheatsheet } from '../lib/preferences'
import type { SheetStore } from '../sheets/collection'
import { getSheetById } from '../sheets/registry'
import { selectSheetId, type SheetSelection } from '../sheets/selection'
import { createLinuxWindowDetector, type WindowDetector } from './active-window'

export interface ResolveActiveSheetOptions {
  store: SheetStore
  detector?: WindowDetector
  /** Skips detection when given */
  sheetId?: string
  /** Defaults to the `fallbackCheatsheet` preference */
  fallbackSheetId?: string
}

export interface ActiveSheet {
  sheet: Readonly<Sheet>
  selection: SheetSelection
  window: ActiveWindow
}

export async function resolveActiveSheet(
  options: ResolveActiveSheetOptions
): Promise<ActiveSheet | null> {
  const { store, sheetId } = options
  const detector =
    options.detector ??
    createLinuxWindowDetector({
      timeoutMs: initializeConfig().settings.detectTimeout,
    })
  const fallbackSheetId =
    options.fallbackSheetId !== undefined
      ? options.fallbackSheetId
      : getFallbackCheatsheet()

  const window = sheetId
    ? { wmClass: '', windowTitle: '' }
    : await detector.detect()

  const selection = selectSheetId(store.sheets, {
    sheetId,
    window,
    fallbackSheetId,
  })
  if (!selection) return null

  return {
    sheet: getSheetById(store.sheets, selection.sheetId),
    selection,
    window,
  }
}
