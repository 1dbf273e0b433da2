import { createEnvConfig } from './config/env'

const envConfig = createEnvConfig()

export const ENVIRONMENT = {
  IS_DEV: envConfig.isDev,
  IS_PROD: envConfig.isProd,
  IS_TEST: envConfig.isTest,
  ENV: envConfig.env,
  APP_NAME: envConfig.appName,
  APP_VERSION: envConfig.appVersion,
} as const

/** Folder name under the user's config root */
export const APP_FOLDER = 'keysheet'

/** Extension of cheatsheet documents */
export const SHEET_FILE_EXTENSION = '.toml'
