/**
 * Sheet Loader
 *
 * Reads one TOML document per sheet from the bundled directory and from
 * the user's directory. A file that cannot be read, parsed or validated
 * is logged and skipped; it never aborts the load.
 */

import { existsSync, readFileSync, readdirSync } from 'node:fs'
import { join } from 'node:path'
import { parse as parseToml } from 'smol-toml'
import { SHEET_FILE_EXTENSION } from 'shared/constants'
import type { Sheet, SheetOverride } from 'shared/sheet-types'
import {
  SheetParseError,
  SheetValidationError,
  describeError,
} from '../lib/errors'
import { logger } from '../lib/logger'
import {
  parseSheetDocument,
  parseSheetOverrideDocument,
  type SchemaResult,
} from './schema'

/**
 * List sheet documents in a directory, sorted by file name
 */
export function discoverSheetFiles(dir: string): string[] {
  if (!existsSync(dir)) {
    logger.sheets.debug(`Sheet directory ${dir} does not exist`)
    return []
  }

  try {
    return readdirSync(dir, { withFileTypes: true })
      .filter(
        entry =>
          (entry.isFile() || entry.isSymbolicLink()) &&
          entry.name.endsWith(SHEET_FILE_EXTENSION)
      )
      .map(entry => entry.name)
      .sort()
      .map(name => join(dir, name))
  } catch (error) {
    logger.sheets.warn(
      `Could not list sheet directory ${dir}: ${describeError(error)}`
    )
    return []
  }
}

/**
 * Read and parse a TOML document (throws SheetParseError)
 */
export function readSheetDocument(file: string): unknown {
  try {
    return parseToml(readFileSync(file, 'utf-8'))
  } catch (error) {
    throw new SheetParseError(file, error)
  }
}

function loadFile<T>(
  file: string,
  parse: (data: unknown, source: string) => SchemaResult<T>
): T | null {
  try {
    const result = parse(readSheetDocument(file), file)
    if (!result.success) {
      throw new SheetValidationError(file, result.issues)
    }
    return result.value
  } catch (error) {
    if (
      error instanceof SheetParseError ||
      error instanceof SheetValidationError
    ) {
      logger.sheets.warn(error.message)
      return null
    }
    throw error
  }
}

/**
 * Load a complete sheet, or null if the file is unusable
 */
export function loadSheetFile(file: string): Sheet | null {
  return loadFile(file, parseSheetDocument)
}

/**
 * Load a user sheet, or null if the file is unusable
 */
export function loadSheetOverrideFile(file: string): SheetOverride | null {
  return loadFile(file, parseSheetOverrideDocument)
}

function compareIds(a: { id: string }, b: { id: string }): number {
  if (a.id < b.id) return -1
  if (a.id > b.id) return 1
  return 0
}

// Keeps the first file per id so each source contributes an id once
function dedupeById<T extends { id: string; source?: string }>(
  sheets: T[]
): T[] {
  const seen = new Map<string, T>()
  for (const sheet of sheets) {
    const existing = seen.get(sheet.id)
    if (existing) {
      logger.sheets.warn(
        `Duplicate sheet id '${sheet.id}' in ${sheet.source}, already defined in ${existing.source}`
      )
      continue
    }
    seen.set(sheet.id, sheet)
  }
  return [...seen.values()]
}

function loadDirectory<T extends { id: string; source?: string }>(
  dir: string,
  load: (file: string) => T | null
): T[] {
  const loaded: T[] = []
  for (const file of discoverSheetFiles(dir)) {
    const sheet = load(file)
    if (sheet) loaded.push(sheet)
  }
  return dedupeById(loaded).sort(compareIds)
}

/**
 * Load the sheets shipped with the package
 */
export function loadDefaultSheets(dir: string): Sheet[] {
  const sheets = loadDirectory(dir, loadSheetFile)
  logger.sheets.debug(`Found ${sheets.length} default sheets.`)
  return sheets
}

/**
 * Load the sheets in the user's sheet directory
 */
export function loadUserSheets(dir: string): SheetOverride[] {
  const sheets = loadDirectory(dir, loadSheetOverrideFile)
  logger.sheets.debug(`Found ${sheets.length} user sheets in ${dir}/.`)
  return sheets
}
