/**
 * Sheet Types
 *
 * Data model for cheatsheets shared by the loading pipeline,
 * the matcher and whatever front-end displays the result.
 */

/**
 * Shortcut text -> description. Insertion order is the display order.
 */
export type Bindings = Record<string, string>

/**
 * Section title -> bindings. Insertion order is the display order.
 */
export type SheetSections = Record<string, Bindings>

/**
 * Patterns evaluated (case-insensitive, search semantics) against the
 * focused window. Stored as `regex_wmclass` / `regex_title` on disk.
 */
export interface SheetMatch {
  regexWmclass: string
  regexTitle: string
}

export interface Sheet {
  id: string
  title?: string
  url: string
  hidden: boolean
  include: string[]
  match: SheetMatch
  section: SheetSections
  /** File the sheet was last read from */
  source?: string
}

/**
 * A user-supplied sheet. Only `id` is required: every other field
 * present extends or replaces the default sheet with the same id.
 */
export interface SheetOverride {
  id: string
  title?: string
  url?: string
  hidden?: boolean
  include?: string[]
  match?: Partial<SheetMatch>
  section?: SheetSections
  source?: string
}

/**
 * Final, read-only result of one load cycle.
 */
export type SheetCollection = readonly Readonly<Sheet>[]

/**
 * Identifying strings of the focused window. Empty when detection failed.
 */
export interface ActiveWindow {
  wmClass: string
  windowTitle: string
}

export type SectionSortOrder = 'native' | 'size' | 'title'

export type SheetOrientation = 'vertical' | 'horizontal'
