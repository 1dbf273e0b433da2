/**
 * Test Fixtures
 *
 * Builders for sheets and temporary sheet directories.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { Sheet } from 'shared/sheet-types'

export function makeSheet(
  id: string,
  overrides: Partial<Omit<Sheet, 'id'>> = {}
): Sheet {
  return {
    id,
    url: '',
    hidden: false,
    include: [],
    match: { regexWmclass: id, regexTitle: '.*' },
    section: {},
    ...overrides,
  }
}

export function createTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `keysheet-test-${prefix}-`))
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true })
}

export function writeSheet(dir: string, name: string, content: string): string {
  mkdirSync(dir, { recursive: true })
  const file = join(dir, name)
  writeFileSync(file, content, 'utf-8')
  return file
}
