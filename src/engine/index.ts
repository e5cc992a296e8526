/**
 * seedtier Engine
 *
 * This module exports the cache/master rebalancing engine: scoring,
 * planning, relocation, the cycle orchestrator and its collaborators.
 *
 * @module engine
 */

export const engineVersion = '0.1.0';

// Type definitions (canonical source for all types)
export * from './types.js';

// Event system
export {
  TypedEventEmitter,
  type EngineEvents,
  type EngineEventEmitter,
  type EngineEventName,
} from './events.js';

// Logging
export { Logger, createSilentLogger, formatFields, type LogFields, type LoggerOptions } from './logger.js';

// Configuration
export * from './config/index.js';

// Engine modules
export * from './scoring/index.js';
export * from './planning/index.js';
export * from './relocation/index.js';
export * from './source/index.js';
export * from './metrics/index.js';
export * from './cycle/index.js';
