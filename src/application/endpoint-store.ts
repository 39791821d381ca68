import type { Endpoint } from '../domain/index.js';

/**
 * Holds the current endpoint snapshot.
 *
 * The array is never mutated in place: every change builds a new one and
 * swaps it in with `set()`. A dispatch that already read the snapshot keeps
 * the array it got, so later changes only affect later reads.
 */
export class EndpointStore {
  private endpoints: readonly Endpoint[];

  constructor(initial: readonly Endpoint[] = []) {
    this.endpoints = initial;
  }

  /** Returns the current snapshot. O(1), no copy. */
  get(): readonly Endpoint[] {
    return this.endpoints;
  }

  /** Atomically replaces the snapshot. */
  set(next: readonly Endpoint[]): void {
    this.endpoints = next;
  }
}
