/**
 * Sheet Template
 *
 * Starter document for a window no sheet matches yet.
 */

import { existsSync, mkdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { SHEET_FILE_EXTENSION } from 'shared/constants'
import { logger } from '../lib/logger'

const DEFAULT_TEMPLATE_ID = 'new-sheet'

export function templateSheetId(wmClass: string): string {
  return wmClass.toLowerCase().replace(/\s+/g, '') || DEFAULT_TEMPLATE_ID
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

// JSON string escapes are valid TOML basic string escapes
function tomlString(value: string): string {
  return JSON.stringify(value)
}

export function renderSheetTemplate(wmClass: string): string {
  const id = templateSheetId(wmClass)

  return [
    `id = ${tomlString(id)}`,
    'url = ""  # Link to the keybinding docs (optional)',
    '',
    '[match]',
    `regex_wmclass = ${tomlString(escapeRegExp(wmClass))}`,
    'regex_title = ".*"  # Narrow down by window title if needed',
    '',
    '[section]',
    '',
    '[section."My Section Title"]',
    '"Ctrl + c" = "Copy to clipboard"',
    '"Ctrl + v" = "Paste from clipboard"',
    '',
  ].join('\n')
}

/**
 * Write a template for `wmClass` into `dir` and return its path
 * An existing file is never overwritten; `<id>_1.toml`, `<id>_2.toml`...
 * are tried instead.
 */
export function createUserSheet(wmClass: string, dir: string): string {
  const id = templateSheetId(wmClass)

  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true })
  }

  let file = join(dir, `${id}${SHEET_FILE_EXTENSION}`)
  for (let idx = 1; existsSync(file); idx++) {
    file = join(dir, `${id}_${idx}${SHEET_FILE_EXTENSION}`)
  }

  writeFileSync(file, renderSheetTemplate(wmClass), 'utf-8')
  logger.sheets.info(`Created sheet template ${file}`)
  return file
}
