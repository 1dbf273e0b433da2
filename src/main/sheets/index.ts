/**
 * Sheets
 *
 * Loading pipeline, matcher and lookups.
 */

export {
  createSheetCollection,
  loadSheets,
  SheetStore,
  type LoadSheetsOptions,
} from './collection'
export { expandIncludes, formatIncludedSectionTitle } from './includes'
export {
  discoverSheetFiles,
  loadDefaultSheets,
  loadSheetFile,
  loadSheetOverrideFile,
  loadUserSheets,
  readSheetDocument,
} from './loader'
export { clearPatternCache, findBestSheetId, matchesWindow } from './matcher'
export { mergeSheets } from './merger'
export { orderSections } from './ordering'
export { findSheetById, getSheetById, listSheetIds } from './registry'
export {
  removeEmptySections,
  removeHiddenSheets,
  sanitizeSheets,
} from './sanitizer'
export {
  parseSheetDocument,
  parseSheetOverrideDocument,
  sheetDocumentSchema,
  sheetOverrideDocumentSchema,
} from './schema'
export {
  selectSheetId,
  type SelectSheetOptions,
  type SelectionReason,
  type SheetSelection,
} from './selection'
export { createUserSheet, renderSheetTemplate } from './template'
