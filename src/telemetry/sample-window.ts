/**
 * SampleWindow - time-windowed sample buffer for one connection
 *
 * Single writer (the connection's decode path), any number of readers.
 * Readers only ever get frozen copies from snapshot()/since().
 */

import { RETENTION, type Sample } from "../state/types";
import { ValidationError } from "../serial/errors";

export interface SampleWindowOptions {
  retentionSeconds?: number;
  maxSamples?: number;
}

const DEFAULT_MAX_SAMPLES = 50_000;

export function clampRetention(seconds: number): number {
  if (!Number.isFinite(seconds)) {
    throw new ValidationError("InvalidRetention", `Retention must be a number of seconds: ${seconds}`);
  }
  return Math.min(RETENTION.MAX_SECONDS, Math.max(RETENTION.MIN_SECONDS, Math.round(seconds)));
}

export class SampleWindow {
  // Array deque: live entries are items[head..]
  private items: Sample[] = [];
  private head = 0;
  private retention: number;
  private readonly maxSamples: number;

  constructor(options: SampleWindowOptions = {}) {
    this.retention = clampRetention(options.retentionSeconds ?? RETENTION.DEFAULT_SECONDS);
    this.maxSamples = options.maxSamples ?? DEFAULT_MAX_SAMPLES;
  }

  /**
   * Retention window in seconds
   */
  get retentionSeconds(): number {
    return this.retention;
  }

  /**
   * Number of samples in the window
   */
  get length(): number {
    return this.items.length - this.head;
  }

  /**
   * Append in arrival order, then evict everything older than the window
   */
  append(sample: Sample): void {
    this.items.push(Object.freeze({ ...sample }));
    this.evict();
  }

  /**
   * Change the window size. Clamped to [5, 600]; evicted samples stay evicted.
   * @throws ValidationError for a non-numeric value
   */
  setRetention(seconds: number): number {
    this.retention = clampRetention(seconds);
    this.evict();
    return this.retention;
  }

  /**
   * Frozen copy of the window, oldest first
   */
  snapshot(): readonly Sample[] {
    return Object.freeze(this.items.slice(this.head));
  }

  /**
   * Frozen copy of samples received after `t` (epoch ms)
   */
  since(t: number): readonly Sample[] {
    let start = this.items.length;
    while (start > this.head && this.items[start - 1].receivedAt > t) {
      start--;
    }
    return Object.freeze(this.items.slice(start));
  }

  /**
   * Newest sample, or null if empty
   */
  latest(): Sample | null {
    return this.length > 0 ? this.items[this.items.length - 1] : null;
  }

  /**
   * Drop all samples
   */
  clear(): void {
    this.items = [];
    this.head = 0;
  }

  private evict(): void {
    const newest = this.latest();
    if (!newest) return;

    const cutoff = newest.receivedAt - this.retention * 1000;
    while (this.head < this.items.length && this.items[this.head].receivedAt < cutoff) {
      this.head++;
    }

    const overflow = this.length - this.maxSamples;
    if (overflow > 0) {
      this.head += overflow;
    }

    // Compact once the dead prefix outweighs the live part
    if (this.head > 0 && this.head >= this.items.length - this.head) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
  }
}
