import type {
  Bindings,
  SectionSortOrder,
  SheetSections,
} from 'shared/sheet-types'

/**
 * Section entries in display order
 * - native: as written
 * - size: most bindings first
 * - title: alphabetical by title
 */
export function orderSections(
  sections: Readonly<SheetSections>,
  sortBy: SectionSortOrder
): [string, Bindings][] {
  const entries = Object.entries(sections)

  switch (sortBy) {
    case 'native':
      return entries
    case 'size':
      return entries.sort(
        ([, a], [, b]) => Object.keys(b).length - Object.keys(a).length
      )
    case 'title':
      return entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  }
}
