/**
 * Sheet Schema
 *
 * Validates parsed TOML documents into typed sheets. Default sheets must
 * be complete; user sheets only need an id since everything else
 * extends the default sheet of the same id.
 */

import { z } from 'zod'
import type { Sheet, SheetOverride } from 'shared/sheet-types'

// Keys a record cannot hold as own properties
const RESERVED_KEYS = ['__proto__']

/**
 * Record schema that reports reserved keys instead of losing them
 */
function recordOf<T extends z.ZodTypeAny>(value: T, what: string) {
  return z.preprocess((data, ctx) => {
    if (typeof data === 'object' && data !== null) {
      for (const key of RESERVED_KEYS) {
        if (Object.hasOwn(data, key)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `${what} '${key}' is not allowed`,
          })
        }
      }
    }
    return data
  }, z.record(z.string(), value))
}

const bindingsSchema = recordOf(z.string(), 'shortcut')

const sectionsSchema = recordOf(bindingsSchema, 'section title')

const matchSchema = z.object({
  regex_wmclass: z.string(),
  regex_title: z.string(),
})

const baseDocumentSchema = z.object({
  id: z.string().trim().min(1, 'must not be empty'),
  title: z.string().optional(),
  url: z.string().optional(),
  hidden: z.boolean().optional(),
  include: z.array(z.string()).optional(),
  section: sectionsSchema.optional(),
})

export const sheetDocumentSchema = baseDocumentSchema.extend({
  match: matchSchema,
})

export const sheetOverrideDocumentSchema = baseDocumentSchema.extend({
  match: matchSchema.partial().optional(),
})

export type SheetDocument = z.infer<typeof sheetDocumentSchema>
export type SheetOverrideDocument = z.infer<typeof sheetOverrideDocumentSchema>

export type SchemaResult<T> =
  | { success: true; value: T }
  | { success: false; issues: string[] }

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

function toSheet(doc: SheetDocument, source?: string): Sheet {
  const sheet: Sheet = {
    id: doc.id,
    url: doc.url ?? '',
    hidden: doc.hidden ?? false,
    include: doc.include ?? [],
    match: {
      regexWmclass: doc.match.regex_wmclass,
      regexTitle: doc.match.regex_title,
    },
    section: doc.section ?? {},
  }
  if (doc.title !== undefined) sheet.title = doc.title
  if (source !== undefined) sheet.source = source
  return sheet
}

// Absent fields stay absent: only what the user wrote overrides
function toSheetOverride(
  doc: SheetOverrideDocument,
  source?: string
): SheetOverride {
  const override: SheetOverride = { id: doc.id }
  if (doc.title !== undefined) override.title = doc.title
  if (doc.url !== undefined) override.url = doc.url
  if (doc.hidden !== undefined) override.hidden = doc.hidden
  if (doc.include !== undefined) override.include = doc.include
  if (doc.section !== undefined) override.section = doc.section
  if (doc.match) {
    const match: SheetOverride['match'] = {}
    if (doc.match.regex_wmclass !== undefined) {
      match.regexWmclass = doc.match.regex_wmclass
    }
    if (doc.match.regex_title !== undefined) {
      match.regexTitle = doc.match.regex_title
    }
    override.match = match
  }
  if (source !== undefined) override.source = source
  return override
}

export function parseSheetDocument(
  data: unknown,
  source?: string
): SchemaResult<Sheet> {
  const result = sheetDocumentSchema.safeParse(data)
  if (!result.success) {
    return { success: false, issues: formatIssues(result.error) }
  }
  return { success: true, value: toSheet(result.data, source) }
}

export function parseSheetOverrideDocument(
  data: unknown,
  source?: string
): SchemaResult<SheetOverride> {
  const result = sheetOverrideDocumentSchema.safeParse(data)
  if (!result.success) {
    return { success: false, issues: formatIssues(result.error) }
  }
  return { success: true, value: toSheetOverride(result.data, source) }
}
