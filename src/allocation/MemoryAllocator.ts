/**
 * In-memory bump allocator
 *
 * Reference BufferAllocator backed by one ArrayBuffer. Every commit replaces
 * the storage with a fresh buffer sized to the pending reservations, the way
 * a compacting GPU allocator relocates everything it manages.
 */

import { fail, ok } from "../errors";
import type { AllocResult, BufferAllocator, BufferHandle, UploadQueue } from "./types";

export interface MemoryAllocatorOptions {
  /** Largest storage the allocator may commit, in bytes (default: unlimited) */
  maxBytes?: number;
}

const ALIGNMENT = 16;

function alignUp(size: number): number {
  return Math.ceil(size / ALIGNMENT) * ALIGNMENT;
}

interface DirtyRange {
  offset: number;
  size: number;
}

export class MemoryAllocator implements BufferAllocator {
  private readonly maxBytes: number;
  private storage = new ArrayBuffer(0);
  private reserved = 0;
  private cursor = 0;
  private handles = new Map<string, BufferHandle>();
  private dirty: DirtyRange[] = [];
  private commits = 0;

  constructor(options: MemoryAllocatorOptions = {}) {
    this.maxBytes = options.maxBytes ?? Infinity;
  }

  /** Committed storage */
  get bytes(): Uint8Array {
    return new Uint8Array(this.storage);
  }

  /** Bytes reserved since the last commit */
  get pendingBytes(): number {
    return this.reserved;
  }

  /** Number of successful commits */
  get commitCount(): number {
    return this.commits;
  }

  get dirtyRanges(): readonly DirtyRange[] {
    return this.dirty;
  }

  reserve(size: number): void {
    this.reserved += alignUp(size);
  }

  commitReservations(): AllocResult<void> {
    const total = this.reserved;
    // A commit ends the reservation round whether or not it succeeds
    this.reserved = 0;
    if (total > this.maxBytes) {
      return fail("ALLOC_COMMIT", `Reserved ${total} bytes exceeds limit of ${this.maxBytes}`);
    }

    this.storage = new ArrayBuffer(Math.max(total, ALIGNMENT));
    this.cursor = 0;
    this.handles.clear();
    this.dirty = [];
    this.commits++;
    return ok(undefined);
  }

  allocateBuffer(slot: number, scope: string, size: number): AllocResult<BufferHandle> {
    const key = `${slot}:${scope}`;
    if (this.handles.has(key)) {
      return fail("ALLOC_BUFFER", `${key} already allocated since the last commit`);
    }

    const aligned = alignUp(size);
    if (this.cursor + aligned > this.storage.byteLength) {
      return fail(
        "ALLOC_BUFFER",
        `No space for ${size} bytes (${key}): ${this.storage.byteLength - this.cursor} of ${this.storage.byteLength} free`
      );
    }

    const handle: BufferHandle = { buffer: this.storage, offset: this.cursor, size };
    this.cursor += aligned;
    this.handles.set(key, handle);
    return ok(handle);
  }

  markDirty(handle: BufferHandle): void {
    if (handle.buffer !== this.storage) {
      console.warn("[MemoryAllocator] Ignoring dirty mark for a handle from an earlier commit");
      return;
    }
    this.dirty.push({ offset: handle.offset, size: handle.size });
  }

  flush(queue?: UploadQueue): AllocResult<void> {
    if (queue) {
      for (const range of this.dirty) {
        queue.writeBuffer(range.offset, new Uint8Array(this.storage, range.offset, range.size));
      }
    }
    this.dirty = [];
    return ok(undefined);
  }
}
