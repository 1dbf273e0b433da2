import { describe, it, expect } from 'vitest'
import { IncludeNotFoundError } from '../lib/errors'
import { expandIncludes, formatIncludedSectionTitle } from './includes'
import { makeSheet } from '../../test/fixtures'

describe('formatIncludedSectionTitle', () => {
  it('should prefix the title with the included sheet id', () => {
    expect(formatIncludedSectionTitle('readline', 'History')).toBe(
      '[readline] History'
    )
  })
})

describe('expandIncludes', () => {
  it('should copy included sections under namespaced titles', () => {
    const sheets = [
      makeSheet('a', {
        include: ['b'],
        section: { Editing: { 'Ctrl + z': 'Undo' } },
      }),
      makeSheet('b', { section: { Editing: { 'Ctrl + y': 'Redo' } } }),
    ]

    const [a] = expandIncludes(sheets)

    expect(a.section).toEqual({
      Editing: { 'Ctrl + z': 'Undo' },
      '[b] Editing': { 'Ctrl + y': 'Redo' },
    })
  })

  it('should leave the included sheet unchanged', () => {
    const sheets = [
      makeSheet('a', { include: ['b'] }),
      makeSheet('b', { section: { Editing: { x: 'Cut' } } }),
    ]

    const [, b] = expandIncludes(sheets)

    expect(b.section).toEqual({ Editing: { x: 'Cut' } })
  })

  it('should expand several includes in order', () => {
    const sheets = [
      makeSheet('terminal', { include: ['readline', 'tmux'] }),
      makeSheet('readline', { section: { History: { 'Ctrl + r': 'Search' } } }),
      makeSheet('tmux', { section: { Panes: { 'Prefix + %': 'Split' } } }),
    ]

    const [terminal] = expandIncludes(sheets)

    expect(Object.keys(terminal.section)).toEqual([
      '[readline] History',
      '[tmux] Panes',
    ])
  })

  it('should include hidden sheets', () => {
    const sheets = [
      makeSheet('a', { include: ['base'] }),
      makeSheet('base', { hidden: true, section: { Core: { q: 'Quit' } } }),
    ]

    const [a] = expandIncludes(sheets)

    expect(a.section['[base] Core']).toEqual({ q: 'Quit' })
  })

  it('should throw when an included sheet does not exist', () => {
    const sheets = [makeSheet('a', { include: ['missing'] })]

    expect(() => expandIncludes(sheets)).toThrow(IncludeNotFoundError)
    expect(() => expandIncludes(sheets)).toThrow(
      "Sheet 'missing' included by 'a' not found"
    )
  })

  it('should not depend on the order of the sheets', () => {
    const build = () => ({
      a: makeSheet('a', { include: ['b'], section: { A: { a: 'a' } } }),
      b: makeSheet('b', { include: ['c'], section: { B: { b: 'b' } } }),
      c: makeSheet('c', { section: { C: { c: 'c' } } }),
    })

    const forward = build()
    expandIncludes([forward.a, forward.b, forward.c])
    const backward = build()
    expandIncludes([backward.c, backward.b, backward.a])

    expect(forward.a.section).toEqual(backward.a.section)
    expect(forward.a.section).toEqual({
      A: { a: 'a' },
      '[b] B': { b: 'b' },
    })
  })

  it('should copy bindings rather than share them', () => {
    const sheets = [
      makeSheet('a', { include: ['b'] }),
      makeSheet('b', { section: { S: { s: 's' } } }),
    ]

    const [a, b] = expandIncludes(sheets)
    a.section['[b] S'].extra = 'added'

    expect(b.section.S).toEqual({ s: 's' })
  })
})
