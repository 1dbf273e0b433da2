/**
 * Shared Configuration Module
 */

export {
  type Environment,
  type EnvConfig,
  parseEnvironment,
  createEnvConfig,
} from './env'
