/**
 * Main Library
 *
 * Re-exports logging, errors and preferences.
 */

export { logger, log, configureLogger, type LogLevel } from './logger'
export { setupErrorHandling } from './error-handler'
export {
  KeysheetError,
  SheetParseError,
  SheetValidationError,
  IncludeNotFoundError,
  SheetNotFoundError,
  SheetPatternError,
  ConfigNotInitializedError,
  describeError,
  type PatternField,
} from './errors'
export {
  getPreference,
  setPreference,
  getAllPreferences,
  resetPreference,
  resetAllPreferences,
  getFallbackCheatsheet,
  setFallbackCheatsheet,
  createPreferencesStore,
  setPreferencesStore,
  preferenceDefaults,
  type Preferences,
} from './preferences'
