/**
 * Fixed-capacity sample history. Appends at the end and evicts the oldest
 * sample once capacity is exceeded; there is no other removal.
 *
 * @module control/history_buffer
 */

/** Default number of samples kept per history. */
export const DEFAULT_HISTORY_CAPACITY = 400;

export class HistoryBuffer {
  private readonly samples: number[] = [];

  /**
   * @throws RangeError when capacity is not a positive integer.
   */
  constructor(readonly capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`HistoryBuffer: capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(sample: number): void {
    this.samples.push(sample);
    if (this.samples.length > this.capacity) {
      this.samples.shift();
    }
  }

  /** Oldest-first copy of the stored samples. */
  snapshot(): readonly number[] {
    return [...this.samples];
  }

  get length(): number {
    return this.samples.length;
  }
}
