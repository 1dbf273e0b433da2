import { describe, it, expect } from 'vitest'
import { SheetNotFoundError } from '../lib/errors'
import { findSheetById, getSheetById, listSheetIds } from './registry'
import { makeSheet } from '../../test/fixtures'

const sheets = [makeSheet('firefox'), makeSheet('vim')]

describe('Sheet Registry', () => {
  it('should return the sheet with the given id', () => {
    expect(getSheetById(sheets, 'vim')).toBe(sheets[1])
  })

  it('should throw SheetNotFoundError for an unknown id', () => {
    expect(() => getSheetById(sheets, 'emacs')).toThrow(SheetNotFoundError)
    expect(() => getSheetById(sheets, 'emacs')).toThrow(
      "Sheet 'emacs' not found"
    )
  })

  it('should return undefined from findSheetById for an unknown id', () => {
    expect(findSheetById(sheets, 'emacs')).toBeUndefined()
  })

  it('should list ids in collection order', () => {
    expect(listSheetIds(sheets)).toEqual(['firefox', 'vim'])
  })
})
