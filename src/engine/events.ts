/**
 * Typed Event Emitter System for the seedtier engine
 *
 * Provides type-safe event emission and subscription for cycle and
 * relocation events. Wraps Node's EventEmitter with full TypeScript
 * type safety.
 */

import { EventEmitter } from 'events';
import type { OperationResult, CyclePhase } from './types.js';
import type { CycleReport } from './cycle/orchestrator.js';

// ============================================================================
// Event Payload Types
// ============================================================================

/**
 * Complete event map for the engine
 */
export interface EngineEvents {
  // Cycle lifecycle
  'cycle:started': { cycle: number };
  'cycle:phase': { cycle: number; phase: CyclePhase };
  'cycle:completed': { report: CycleReport };
  'cycle:failed': { cycle: number; error: Error };

  // Relocation
  'operation:finished': { cycle: number; result: OperationResult };

  // Scheduler lifecycle
  'scheduler:stopped': void;
}

// ============================================================================
// TypedEventEmitter Implementation
// ============================================================================

type Listener<P> = P extends void ? () => void : (payload: P) => void;

/**
 * Type-safe event emitter that wraps Node's EventEmitter
 *
 * @template T - Event map type defining event names and their payload types
 *
 * @example
 * ```typescript
 * const emitter = new TypedEventEmitter<EngineEvents>();
 *
 * emitter.on('cycle:completed', ({ report }) => {
 *   console.log(`Cycle ${report.cycle} ran ${report.results.length} operations`);
 * });
 * ```
 */
export class TypedEventEmitter<T extends { [K in keyof T]: unknown }> {
  private emitter: EventEmitter;

  constructor() {
    this.emitter = new EventEmitter();
  }

  /**
   * Subscribe to an event
   *
   * @returns this for chaining
   */
  on<K extends keyof T>(event: K, listener: Listener<T[K]>): this {
    this.emitter.on(event as string, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Subscribe to an event once (auto-unsubscribes after first emission)
   */
  once<K extends keyof T>(event: K, listener: Listener<T[K]>): this {
    this.emitter.once(event as string, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Unsubscribe from an event
   */
  off<K extends keyof T>(event: K, listener: Listener<T[K]>): this {
    this.emitter.off(event as string, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Emit an event with payload
   *
   * @returns true if event had listeners, false otherwise
   */
  emit<K extends keyof T>(
    event: K,
    ...args: T[K] extends void ? [] : [payload: T[K]]
  ): boolean {
    return this.emitter.emit(event as string, ...args);
  }

  /**
   * Remove all listeners for a specific event or all events
   */
  removeAllListeners<K extends keyof T>(event?: K): this {
    if (event !== undefined) {
      this.emitter.removeAllListeners(event as string);
    } else {
      this.emitter.removeAllListeners();
    }
    return this;
  }

  /**
   * Get the number of listeners for a specific event
   */
  listenerCount<K extends keyof T>(event: K): number {
    return this.emitter.listenerCount(event as string);
  }

  /**
   * Returns a promise that resolves when the specified event is emitted
   */
  waitFor<K extends keyof T>(event: K): Promise<T[K]> {
    return new Promise((resolve) => {
      this.once(event, ((payload: T[K]) => {
        resolve(payload);
      }) as Listener<T[K]>);
    });
  }
}

// ============================================================================
// Type Aliases
// ============================================================================

/**
 * Pre-configured event emitter type for engine events
 */
export type EngineEventEmitter = TypedEventEmitter<EngineEvents>;

/**
 * Type representing valid event names
 */
export type EngineEventName = keyof EngineEvents;
