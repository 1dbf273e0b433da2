import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { join } from 'node:path'
import { IncludeNotFoundError } from '../lib/errors'
import { createSheetCollection, loadSheets, SheetStore } from './collection'
import { createTempDir, makeSheet, removeDir, writeSheet } from '../../test/fixtures'

const EDITOR_TOML = `
id = "editor"
include = ["common"]

[match]
regex_wmclass = "editor"
regex_title = ".*"

[section.Editing]
"Ctrl + z" = "Undo"
"Ctrl + y" = "Redo"

[section.Files]
"Ctrl + s" = "Save"
`

const COMMON_TOML = `
id = "common"
hidden = true

[match]
regex_wmclass = "^$"
regex_title = "^$"

[section.Clipboard]
"Ctrl + c" = "Copy"
`

describe('createSheetCollection', () => {
  it('should drop hidden sheets whatever their contents', () => {
    const sheets = createSheetCollection([
      makeSheet('shown', { section: { S: { s: 's' } } }),
      makeSheet('secret', { hidden: true, section: { S: { s: 's' } } }),
    ])

    expect(sheets.map(sheet => sheet.id)).toEqual(['shown'])
  })

  it('should prune a section emptied by a user sheet', () => {
    const sheets = createSheetCollection(
      [makeSheet('x', { section: { A: { a: 'a' }, B: { b: 'b' } } })],
      [{ id: 'x', section: { A: {} } }]
    )

    expect(sheets[0].section).toEqual({ B: { b: 'b' } })
  })

  it('should expand includes from the merged sheets', () => {
    const sheets = createSheetCollection(
      [
        makeSheet('a', { include: ['b'] }),
        makeSheet('b', { section: { S: { old: 'default' } } }),
      ],
      [{ id: 'b', section: { S: { new: 'user' } } }]
    )

    expect(sheets[0].section).toEqual({ '[b] S': { new: 'user' } })
  })

  it('should fail when an include is missing', () => {
    expect(() =>
      createSheetCollection([makeSheet('a', { include: ['ghost'] })])
    ).toThrow(IncludeNotFoundError)
  })

  it('should fail when a user sheet adds a missing include', () => {
    expect(() =>
      createSheetCollection([makeSheet('a')], [{ id: 'a', include: ['ghost'] }])
    ).toThrow("Sheet 'ghost' included by 'a' not found")
  })

  it('should return a frozen collection', () => {
    const sheets = createSheetCollection([
      makeSheet('a', { section: { S: { s: 's' } } }),
    ])

    expect(Object.isFrozen(sheets)).toBe(true)
    expect(Object.isFrozen(sheets[0])).toBe(true)
    expect(Object.isFrozen(sheets[0].section.S)).toBe(true)
  })
})

describe('loadSheets', () => {
  let sheetsDir: string
  let userSheetsDir: string

  beforeEach(() => {
    sheetsDir = createTempDir('defaults')
    userSheetsDir = createTempDir('user')
  })

  afterEach(() => {
    removeDir(sheetsDir)
    removeDir(userSheetsDir)
  })

  it('should run the whole pipeline over both directories', () => {
    writeSheet(sheetsDir, 'editor.toml', EDITOR_TOML)
    writeSheet(sheetsDir, 'common.toml', COMMON_TOML)
    writeSheet(
      userSheetsDir,
      'editor.toml',
      'id = "editor"\n\n[section.Files]\n"Ctrl + Shift + s" = "Save as"\n'
    )

    const sheets = loadSheets({ sheetsDir, userSheetsDir })

    expect(sheets).toHaveLength(1)
    expect(sheets[0].id).toBe('editor')
    expect(sheets[0].section).toEqual({
      Editing: { 'Ctrl + z': 'Undo', 'Ctrl + y': 'Redo' },
      Files: { 'Ctrl + Shift + s': 'Save as' },
      '[common] Clipboard': { 'Ctrl + c': 'Copy' },
    })
    expect(sheets[0].source).toBe(join(userSheetsDir, 'editor.toml'))
  })

  it('should add user sheets that have no default', () => {
    writeSheet(
      userSheetsDir,
      'gimp.toml',
      'id = "gimp"\n\n[match]\nregex_wmclass = "gimp"\nregex_title = ".*"\n\n[section.Tools]\nm = "Move"\n'
    )

    const sheets = loadSheets({ sheetsDir, userSheetsDir })

    expect(sheets.map(sheet => sheet.id)).toEqual(['gimp'])
  })

  it('should ignore a malformed user file', () => {
    writeSheet(sheetsDir, 'editor.toml', EDITOR_TOML)
    writeSheet(sheetsDir, 'common.toml', COMMON_TOML)
    writeSheet(userSheetsDir, 'broken.toml', 'id = "editor\n')

    const sheets = loadSheets({ sheetsDir, userSheetsDir })

    expect(sheets.map(sheet => sheet.id)).toEqual(['editor'])
  })

  it('should abort when an include cannot be resolved', () => {
    writeSheet(sheetsDir, 'editor.toml', EDITOR_TOML)

    expect(() => loadSheets({ sheetsDir, userSheetsDir })).toThrow(
      "Sheet 'common' included by 'editor' not found"
    )
  })
})

describe('SheetStore', () => {
  it('should expose the loaded collection', () => {
    const store = new SheetStore(() =>
      createSheetCollection([makeSheet('firefox')])
    )

    expect(store.sheets.map(sheet => sheet.id)).toEqual(['firefox'])
    expect(store.getSheet('firefox').id).toBe('firefox')
    expect(store.findSheet('vim')).toBeUndefined()
    expect(store.findBestSheetId('Firefox', 'Home')).toBe('firefox')
  })

  it('should swap in a new collection on reload', () => {
    const load = vi
      .fn()
      .mockReturnValueOnce(createSheetCollection([makeSheet('first')]))
      .mockReturnValueOnce(createSheetCollection([makeSheet('second')]))
    const store = new SheetStore(load)
    const before = store.sheets

    const after = store.reload()

    expect(before.map(sheet => sheet.id)).toEqual(['first'])
    expect(after.map(sheet => sheet.id)).toEqual(['second'])
    expect(store.sheets).toBe(after)
  })

  it('should keep the previous collection when a reload fails', () => {
    const initial = createSheetCollection([makeSheet('first')])
    const load = vi
      .fn()
      .mockReturnValueOnce(initial)
      .mockImplementationOnce(() => {
        throw new IncludeNotFoundError('ghost', 'first')
      })
    const store = new SheetStore(load)

    expect(() => store.reload()).toThrow(IncludeNotFoundError)
    expect(store.sheets).toBe(initial)
  })
})
