import type { Sheet, SheetSections } from 'shared/sheet-types'

export function cloneSections(sections: SheetSections): SheetSections {
  const copy: SheetSections = {}
  for (const [title, bindings] of Object.entries(sections)) {
    copy[title] = { ...bindings }
  }
  return copy
}

export function cloneSheet(sheet: Readonly<Sheet>): Sheet {
  return {
    ...sheet,
    include: [...sheet.include],
    match: { ...sheet.match },
    section: cloneSections(sheet.section),
  }
}
