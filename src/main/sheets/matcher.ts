/**
 * Sheet Matcher
 *
 * Picks the sheet for the focused window. Every sheet whose two
 * patterns both match is a candidate; the candidate with the longest
 * `regex_wmclass` wins, then the longest `regex_title`, then load order.
 *
 * Pattern length stands in for specificity and is only an approximation:
 * `Fire.*` loses to `Firefox` because it is one character shorter.
 */

import type { Sheet } from 'shared/sheet-types'
import { SheetPatternError, type PatternField } from '../lib/errors'
import { logger } from '../lib/logger'

type MatchableSheet = Pick<Readonly<Sheet>, 'id' | 'match'>

const patternCache = new Map<string, RegExp>()

function compilePattern(
  sheet: MatchableSheet,
  field: PatternField,
  pattern: string
): RegExp {
  const cached = patternCache.get(pattern)
  if (cached) return cached

  try {
    const regex = new RegExp(pattern, 'i')
    patternCache.set(pattern, regex)
    return regex
  } catch (error) {
    throw new SheetPatternError(sheet.id, field, pattern, error)
  }
}

/**
 * Whether both patterns of a sheet match (throws SheetPatternError)
 */
export function matchesWindow(
  sheet: MatchableSheet,
  wmClass: string,
  windowTitle: string
): boolean {
  const { regexWmclass, regexTitle } = sheet.match
  return (
    compilePattern(sheet, 'regex_wmclass', regexWmclass).test(wmClass) &&
    compilePattern(sheet, 'regex_title', regexTitle).test(windowTitle)
  )
}

// Length in code points
function patternLength(pattern: string): number {
  return [...pattern].length
}

/**
 * Id of the best matching sheet, or null when nothing matches
 */
export function findBestSheetId(
  sheets: readonly MatchableSheet[],
  wmClass: string,
  windowTitle: string
): string | null {
  const matching = sheets.filter(sheet => {
    try {
      return matchesWindow(sheet, wmClass, windowTitle)
    } catch (error) {
      if (!(error instanceof SheetPatternError)) throw error
      logger.matcher.warn(error.message)
      return false
    }
  })

  if (matching.length === 0) {
    logger.matcher.debug(
      `No sheet matches wm_class '${wmClass}' and title '${windowTitle}'`
    )
    return null
  }

  // Secondary criterion first; the stable second sort keeps it for ties
  matching.sort(
    (a, b) =>
      patternLength(b.match.regexTitle) - patternLength(a.match.regexTitle)
  )
  matching.sort(
    (a, b) =>
      patternLength(b.match.regexWmclass) - patternLength(a.match.regexWmclass)
  )

  return matching[0].id
}

export function clearPatternCache(): void {
  patternCache.clear()
}
