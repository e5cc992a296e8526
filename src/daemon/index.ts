/**
 * Daemon Module for seedtier
 *
 * Exports the runtime wiring used by the CLI and the container entry point.
 *
 * @module daemon
 */

export {
  createRuntime,
  runDaemon,
  isStartupError,
  type Runtime,
  type RuntimeOptions,
} from './runtime.js';
