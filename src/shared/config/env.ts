/**
 * Environment Configuration
 *
 * Type-safe environment detection shared by every part of the library.
 */

export type Environment = 'development' | 'production' | 'test'

export interface EnvConfig {
  env: Environment
  isDev: boolean
  isProd: boolean
  isTest: boolean
  appName: string
  appVersion: string
}

/**
 * Validates and parses environment string
 */
export function parseEnvironment(value: string | undefined): Environment {
  const env = value?.toLowerCase()
  if (env === 'production' || env === 'prod') return 'production'
  if (env === 'test') return 'test'
  return 'development'
}

/**
 * Creates base environment config from the process environment
 */
export function createEnvConfig(
  source: NodeJS.ProcessEnv = process.env
): EnvConfig {
  const env = parseEnvironment(source.NODE_ENV)

  return {
    env,
    isDev: env === 'development',
    isProd: env === 'production',
    isTest: env === 'test',
    appName: 'keysheet',
    appVersion: source.npm_package_version || '0.0.0',
  }
}
