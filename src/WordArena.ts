/**
 * Growable word storage
 *
 * Accumulates 32-bit words on the CPU with paired u32/f32 views over one
 * ArrayBuffer. Automatically grows as needed.
 */

import { createWordViews, type WordViews } from "./primitives/codec";

export class WordArena {
  private views: WordViews;
  private capacity: number;
  private length = 0;
  private readonly initialCapacity: number;

  constructor(initialCapacity: number = 256) {
    this.initialCapacity = Math.max(1, initialCapacity);
    this.capacity = this.initialCapacity;
    this.views = createWordViews(new ArrayBuffer(this.capacity * 4));
  }

  /**
   * Current number of words in use
   */
  get count(): number {
    return this.length;
  }

  /**
   * Views over the whole backing store. Only the first `count` words are
   * meaningful, and the views are replaced whenever the arena grows.
   */
  get words(): WordViews {
    return this.views;
  }

  /**
   * Claim `words` words at the end of the arena.
   *
   * @returns Word index of the first claimed word
   */
  allocate(words: number): number {
    this.ensureCapacity(this.length + words);
    const start = this.length;
    this.length += words;
    return start;
  }

  /**
   * Copy of the words in [start, end)
   */
  slice(start: number, end: number): Uint32Array {
    return this.views.u32.slice(start, Math.min(end, this.length));
  }

  /**
   * Forget all words and drop any storage grown past the initial capacity.
   */
  release(): void {
    this.length = 0;
    if (this.capacity !== this.initialCapacity) {
      this.capacity = this.initialCapacity;
      this.views = createWordViews(new ArrayBuffer(this.capacity * 4));
    }
  }

  /**
   * Ensure we have enough capacity
   */
  private ensureCapacity(needed: number): void {
    if (needed <= this.capacity) return;

    // Grow by 2x
    const newCapacity = Math.max(needed, this.capacity * 2);
    const next = createWordViews(new ArrayBuffer(newCapacity * 4));

    // Copy existing data
    next.u32.set(this.views.u32.subarray(0, this.length));
    this.views = next;
    this.capacity = newCapacity;
  }
}
