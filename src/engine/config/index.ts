/**
 * Engine configuration module.
 *
 * Exports default configuration values, the environment loader and
 * utilities for managing engine configuration.
 *
 * @module engine/config
 */

export { DEFAULT_CONFIG, mergeWithDefaults } from './defaults.js';
export {
  loadConfigFromEnv,
  redactConfig,
  type Environment,
  type EnvLoadOptions,
} from './env.js';
