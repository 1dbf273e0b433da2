/**
 * Preferences Store
 *
 * Simple key-value storage using conf.
 * Holds the host's window state and the fallback cheatsheet id.
 */

import Conf from 'conf'
import type { SectionSortOrder, SheetOrientation } from 'shared/sheet-types'
import { getUserConfigDir } from '../config/paths'
import { logger } from './logger'

type Preferences = {
  fullscreen: boolean
  sortBy: SectionSortOrder
  orientation: SheetOrientation
  zoom: number

  // Sheet shown when nothing matches the focused window
  fallbackCheatsheet: string
}

const defaults: Preferences = {
  fullscreen: true,
  sortBy: 'size',
  orientation: 'vertical',
  zoom: 100,
  fallbackCheatsheet: 'keysheet',
}

let store: Conf<Preferences> | null = null

/**
 * Create a store backed by `preferences.json` in `cwd`
 * (defaults to the user's keysheet config folder)
 */
export function createPreferencesStore(
  options: { cwd?: string } = {}
): Conf<Preferences> {
  return new Conf<Preferences>({
    projectName: 'keysheet',
    configName: 'preferences',
    cwd: options.cwd ?? getUserConfigDir(),
    defaults,
  })
}

function getStore(): Conf<Preferences> {
  if (!store) {
    store = createPreferencesStore()
  }
  return store
}

/**
 * Replace the backing store; `null` recreates the default one lazily
 */
export function setPreferencesStore(next: Conf<Preferences> | null): void {
  store = next
}

/**
 * Get a preference value
 */
export function getPreference<K extends keyof Preferences>(
  key: K
): Preferences[K] {
  return getStore().get(key)
}

/**
 * Set a preference value
 */
export function setPreference<K extends keyof Preferences>(
  key: K,
  value: Preferences[K]
): void {
  getStore().set(key, value)
  logger.store.debug(`Preference set: ${key}`)
}

export function getAllPreferences(): Preferences {
  return getStore().store
}

/**
 * Reset a preference to default
 */
export function resetPreference<K extends keyof Preferences>(key: K): void {
  getStore().reset(key)
  logger.store.debug(`Preference reset: ${key}`)
}

export function resetAllPreferences(): void {
  getStore().clear()
  logger.store.info('All preferences reset to defaults')
}

/**
 * Configured fallback sheet id, or undefined when unset
 */
export function getFallbackCheatsheet(): string | undefined {
  const value = getPreference('fallbackCheatsheet').trim()
  return value || undefined
}

export function setFallbackCheatsheet(sheetId: string): void {
  setPreference('fallbackCheatsheet', sheetId)
}

export { defaults as preferenceDefaults }
export type { Preferences }
