/**
 * Bounded-cadence progress reporting for long-running operations
 */

import { logger as baseLogger } from './logger.js';
import type { ProgressCallback } from './types.js';

const logger = baseLogger.child('progress');

export interface ThrottleOptions {
  /** Emit after this many ticks since the last event */
  everyItems: number;
  /** Emit when this much time has passed since the last event */
  intervalMs: number;
  now?: () => number;
}

/**
 * Forwards snapshots to a callback at most every N items or T milliseconds,
 * whichever comes first. Snapshots are frozen before they leave.
 */
export class ProgressThrottle<T extends object> {
  private callback?: ProgressCallback<T>;
  private everyItems: number;
  private intervalMs: number;
  private now: () => number;
  private sinceLast = 0;
  private lastEmit: number;
  private emittedCount = 0;

  constructor(callback: ProgressCallback<T> | undefined, options: ThrottleOptions) {
    this.callback = callback;
    this.everyItems = Math.max(1, Math.floor(options.everyItems));
    this.intervalMs = Math.max(0, options.intervalMs);
    this.now = options.now ?? Date.now;
    this.lastEmit = this.now();
  }

  /**
   * Count one unit of work; `build` only runs when an event is due.
   */
  tick(build: () => T): void {
    if (!this.callback) return;
    this.sinceLast++;
    const now = this.now();
    if (this.sinceLast >= this.everyItems || now - this.lastEmit >= this.intervalMs) {
      this.emit(build(), now);
    }
  }

  /**
   * Emit unconditionally, e.g. the final state of a run.
   */
  flush(build: () => T): void {
    if (!this.callback) return;
    this.emit(build(), this.now());
  }

  get emitted(): number {
    return this.emittedCount;
  }

  private emit(snapshot: T, now: number): void {
    this.sinceLast = 0;
    this.lastEmit = now;
    this.emittedCount++;
    try {
      this.callback?.(Object.freeze(snapshot));
    } catch (error) {
      logger.warn('Progress callback threw', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
