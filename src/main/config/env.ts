/**
 * Environment Validation
 *
 * Validates and types the environment variables the library reads.
 */

import type { LogLevel } from '../lib/logger'

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export interface MainEnvVars {
  logLevel: LogLevel
  sheetsDir: string | undefined
  userSheetsDir: string | undefined
  detectTimeout: number
}

function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel
): LogLevel {
  if (!value) return fallback
  const lower = value.toLowerCase()
  return LOG_LEVELS.find(level => level === lower) ?? fallback
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback
  const num = Number.parseInt(value, 10)
  return Number.isNaN(num) || num <= 0 ? fallback : num
}

function parsePath(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

/**
 * Validates environment variables
 */
export function validateMainEnv(
  isDev: boolean,
  env: NodeJS.ProcessEnv = process.env
): MainEnvVars {
  return {
    logLevel: parseLogLevel(env.KEYSHEET_LOG_LEVEL, isDev ? 'debug' : 'info'),
    sheetsDir: parsePath(env.KEYSHEET_SHEETS_DIR),
    userSheetsDir: parsePath(env.KEYSHEET_USER_SHEETS_DIR),
    detectTimeout: parseNumber(env.KEYSHEET_DETECT_TIMEOUT, 3000),
  }
}
