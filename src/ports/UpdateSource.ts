import type { Update } from './Update.js';

export interface UpdateSource {
  readonly mode: 'polling' | 'webhook';
  /**
   * Lazy sequence of id-ordered batches containing only ids greater than `startAfter`.
   * Ends when `signal` aborts. The consumer finishes a batch before asking for the next.
   */
  batches(startAfter: number, signal: AbortSignal): AsyncIterable<Update[]>;
  /** Reports updates whose effects are durably committed (or skipped as already done). */
  acknowledge(updateIds: readonly number[]): void;
}
