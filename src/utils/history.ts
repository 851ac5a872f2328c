/**
 * Rolling History Buffer
 *
 * Fixed-capacity ring of readings in arrival order.
 * When full, each append evicts exactly the oldest entry (FIFO).
 *
 * Readers never see a half-applied append: `snapshot()` returns a frozen
 * copy, and appends run to completion on the event loop before any reader
 * gets a turn.
 */

import { Reading } from '../types/reading';

export class HistoryBuffer {
  private readonly slots: Array<Reading | undefined>;
  private head = 0; // index of the oldest entry
  private length = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<Reading | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.length;
  }

  /**
   * Insert at the tail. Returns the evicted reading, if any.
   */
  append(reading: Reading): Reading | undefined {
    if (this.length < this.capacity) {
      this.slots[(this.head + this.length) % this.capacity] = reading;
      this.length++;
      return undefined;
    }

    // Full: overwrite the oldest slot and advance the head
    const evicted = this.slots[this.head];
    this.slots[this.head] = reading;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /**
   * Point-in-time copy, oldest first
   */
  snapshot(): readonly Reading[] {
    const result: Reading[] = [];
    for (let i = 0; i < this.length; i++) {
      const reading = this.slots[(this.head + i) % this.capacity];
      if (reading) {
        result.push(reading);
      }
    }
    return Object.freeze(result);
  }

  /**
   * Most recent reading, or undefined when empty
   */
  latest(): Reading | undefined {
    if (this.length === 0) {
      return undefined;
    }
    return this.slots[(this.head + this.length - 1) % this.capacity];
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.length = 0;
  }
}
