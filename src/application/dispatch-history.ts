import type { DispatchResult } from '../domain/index.js';

export const DEFAULT_HISTORY_SIZE = 100;

/**
 * Bounded record of recent dispatch results, newest first.
 * Oldest entries are dropped once `capacity` is reached.
 */
export class DispatchHistory {
  private readonly entries: DispatchResult[] = [];
  private readonly capacity: number;

  constructor(capacity: number = DEFAULT_HISTORY_SIZE) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  record(result: DispatchResult): void {
    this.entries.unshift(result);
    if (this.entries.length > this.capacity) {
      this.entries.length = this.capacity;
    }
  }

  /** Up to `limit` most recent results. */
  recent(limit: number = this.capacity): DispatchResult[] {
    return this.entries.slice(0, Math.max(0, limit));
  }

  get size(): number {
    return this.entries.length;
  }
}
