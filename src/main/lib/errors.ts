/**
 * Error Taxonomy
 *
 * Parse and validation errors are recovered per file by the loader and
 * pattern errors per sheet by the matcher. Include and lookup errors
 * propagate to the caller.
 */

export class KeysheetError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'KeysheetError'
  }
}

/**
 * A sheet document that could not be read or is not valid TOML
 */
export class SheetParseError extends KeysheetError {
  constructor(
    readonly file: string,
    cause: unknown
  ) {
    super(`Could not load sheet file ${file}: ${describeError(cause)}`, {
      cause,
    })
    this.name = 'SheetParseError'
  }
}

/**
 * A parsed document that does not have the shape of a sheet
 */
export class SheetValidationError extends KeysheetError {
  constructor(
    readonly file: string,
    readonly issues: string[]
  ) {
    super(`Invalid sheet in ${file}: ${issues.join('; ')}`)
    this.name = 'SheetValidationError'
  }
}

export class IncludeNotFoundError extends KeysheetError {
  constructor(
    readonly includeId: string,
    readonly sheetId: string
  ) {
    super(`Sheet '${includeId}' included by '${sheetId}' not found`)
    this.name = 'IncludeNotFoundError'
  }
}

export class SheetNotFoundError extends KeysheetError {
  constructor(readonly sheetId: string) {
    super(`Sheet '${sheetId}' not found`)
    this.name = 'SheetNotFoundError'
  }
}

export type PatternField = 'regex_wmclass' | 'regex_title'

export class SheetPatternError extends KeysheetError {
  constructor(
    readonly sheetId: string,
    readonly field: PatternField,
    readonly pattern: string,
    cause: unknown
  ) {
    super(
      `Invalid ${field} '${pattern}' in sheet '${sheetId}': ${describeError(cause)}`,
      { cause }
    )
    this.name = 'SheetPatternError'
  }
}

export class ConfigNotInitializedError extends KeysheetError {
  constructor() {
    super('Configuration not initialized. Call initializeConfig() first.')
    this.name = 'ConfigNotInitializedError'
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
