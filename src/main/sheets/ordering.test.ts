import { describe, it, expect } from 'vitest'
import { orderSections } from './ordering'

const sections = {
  Navigation: { a: 'a', b: 'b' },
  Editing: { a: 'a', b: 'b', c: 'c' },
  Clipboard: { a: 'a' },
  Search: { a: 'a', b: 'b' },
}

function titles(entries: [string, unknown][]): string[] {
  return entries.map(([title]) => title)
}

describe('orderSections', () => {
  it('should keep the written order for native', () => {
    expect(titles(orderSections(sections, 'native'))).toEqual([
      'Navigation',
      'Editing',
      'Clipboard',
      'Search',
    ])
  })

  it('should put larger sections first for size, keeping ties in order', () => {
    expect(titles(orderSections(sections, 'size'))).toEqual([
      'Editing',
      'Navigation',
      'Search',
      'Clipboard',
    ])
  })

  it('should sort alphabetically for title', () => {
    expect(titles(orderSections(sections, 'title'))).toEqual([
      'Clipboard',
      'Editing',
      'Navigation',
      'Search',
    ])
  })

  it('should not reorder the sections object', () => {
    orderSections(sections, 'title')

    expect(Object.keys(sections)).toEqual([
      'Navigation',
      'Editing',
      'Clipboard',
      'Search',
    ])
  })
})
