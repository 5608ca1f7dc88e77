import { describe, it, expect, vi } from "vitest";
import { MemoryAllocator } from "./MemoryAllocator";
import { MemoryMetadataStore } from "./MemoryMetadataStore";
import type { BufferHandle } from "./types";

function allocate(allocator: MemoryAllocator, slot: number, scope: string, size: number): BufferHandle {
  const result = allocator.allocateBuffer(slot, scope, size);
  if (!result.ok) throw new Error(result.error.detail);
  return result.value;
}

describe("MemoryAllocator", () => {
  describe("reserve / commit", () => {
    it("rounds reservations up to 16 bytes", () => {
      const allocator = new MemoryAllocator();
      allocator.reserve(4);
      allocator.reserve(17);

      expect(allocator.pendingBytes).toBe(48);
    });

    it("commits fresh storage sized to the reservations", () => {
      const allocator = new MemoryAllocator();
      allocator.reserve(100);

      expect(allocator.commitReservations()).toEqual({ ok: true, value: undefined });
      expect(allocator.bytes.byteLength).toBe(112);
      expect(allocator.pendingBytes).toBe(0);
      expect(allocator.commitCount).toBe(1);
    });

    it("fails a commit over the byte limit and keeps the old storage", () => {
      const allocator = new MemoryAllocator({ maxBytes: 64 });
      allocator.reserve(32);
      allocator.commitReservations();
      const before = allocator.bytes.buffer;
      allocator.reserve(80);

      expect(allocator.commitReservations()).toEqual({
        ok: false,
        error: { code: "ALLOC_COMMIT", detail: "Reserved 80 bytes exceeds limit of 64" },
      });
      expect(allocator.bytes.buffer).toBe(before);
      expect(allocator.pendingBytes).toBe(0);
    });
  });

  describe("allocateBuffer", () => {
    it("bumps through committed storage", () => {
      const allocator = new MemoryAllocator();
      allocator.reserve(20);
      allocator.reserve(8);
      allocator.commitReservations();

      const a = allocate(allocator, 0, "prims", 20);
      const b = allocate(allocator, 0, "derived", 8);

      expect(a.offset).toBe(0);
      expect(a.size).toBe(20);
      expect(b.offset).toBe(32);
      expect(b.buffer).toBe(a.buffer);
    });

    it("rejects a repeated key until the next commit", () => {
      const allocator = new MemoryAllocator();
      allocator.reserve(32);
      allocator.commitReservations();

      allocate(allocator, 3, "prims", 16);

      expect(allocator.allocateBuffer(3, "prims", 8)).toEqual({
        ok: false,
        error: { code: "ALLOC_BUFFER", detail: "3:prims already allocated since the last commit" },
      });
      expect(allocate(allocator, 4, "prims", 8).offset).toBe(16);

      allocator.reserve(16);
      allocator.commitReservations();
      expect(allocate(allocator, 3, "prims", 16).offset).toBe(0);
    });

    it("fails when committed space runs out", () => {
      const allocator = new MemoryAllocator();
      allocator.reserve(16);
      allocator.commitReservations();

      const result = allocator.allocateBuffer(0, "prims", 32);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe("ALLOC_BUFFER");
        expect(result.error.detail).toBe("No space for 32 bytes (0:prims): 16 of 16 free");
      }
    });

    it("invalidates handles on the next commit", () => {
      const allocator = new MemoryAllocator();
      allocator.reserve(16);
      allocator.commitReservations();
      const before = allocate(allocator, 0, "prims", 16);

      allocator.reserve(16);
      allocator.commitReservations();
      const after = allocate(allocator, 0, "prims", 16);

      expect(after).not.toBe(before);
      expect(after.buffer).not.toBe(before.buffer);
    });
  });

  describe("markDirty / flush", () => {
    it("uploads dirty ranges and clears them", () => {
      const allocator = new MemoryAllocator();
      allocator.reserve(32);
      allocator.commitReservations();
      const handle = allocate(allocator, 0, "prims", 8);
      new Uint32Array(handle.buffer, handle.offset, 2).set([7, 9]);
      allocator.markDirty(handle);

      const uploads: [number, number[]][] = [];
      const result = allocator.flush({
        writeBuffer: (offset, data) => {
          uploads.push([offset, Array.from(new Uint32Array(data.slice().buffer))]);
        },
      });

      expect(result.ok).toBe(true);
      expect(uploads).toEqual([[0, [7, 9]]]);
      expect(allocator.dirtyRanges).toHaveLength(0);
    });

    it("ignores handles from an earlier commit", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const allocator = new MemoryAllocator();
      allocator.reserve(16);
      allocator.commitReservations();
      const stale = allocate(allocator, 0, "prims", 16);
      allocator.reserve(16);
      allocator.commitReservations();

      allocator.markDirty(stale);

      expect(allocator.dirtyRanges).toHaveLength(0);
      expect(warn).toHaveBeenCalledWith(
        "[MemoryAllocator] Ignoring dirty mark for a handle from an earlier commit"
      );
    });
  });
});

describe("MemoryMetadataStore", () => {
  it("hands out 64-byte aligned slots", () => {
    const store = new MemoryMetadataStore(256);
    const a = store.allocateMetadata(64);
    const b = store.allocateMetadata(10);

    expect(a).toEqual({ ok: true, value: { offset: 0, size: 64 } });
    expect(b).toEqual({ ok: true, value: { offset: 64, size: 10 } });
  });

  it("fails when full", () => {
    const store = new MemoryMetadataStore(64);
    store.allocateMetadata(64);

    expect(store.allocateMetadata(64)).toEqual({
      ok: false,
      error: { code: "ALLOC_METADATA", detail: "Metadata buffer full: 64 bytes requested" },
    });
  });

  it("writes within a slot", () => {
    const store = new MemoryMetadataStore(128);
    store.allocateMetadata(64);
    const slot = store.allocateMetadata(64);
    if (!slot.ok) throw new Error(slot.error.detail);

    store.writeMetadata(slot.value, new Uint8Array([1, 2]));
    store.writeMetadataAt(slot.value, 62, new Uint8Array([3, 4]));

    const bytes = store.read(slot.value);
    expect(Array.from(bytes.subarray(0, 2))).toEqual([1, 2]);
    expect(Array.from(bytes.subarray(62))).toEqual([3, 4]);
    expect(store.bytes[64]).toBe(1);
  });

  it("rejects writes past the slot", () => {
    const store = new MemoryMetadataStore(128);
    const slot = store.allocateMetadata(64);
    if (!slot.ok) throw new Error(slot.error.detail);

    const result = store.writeMetadataAt(slot.value, 60, new Uint8Array(8));

    expect(result).toEqual({
      ok: false,
      error: { code: "METADATA_WRITE", detail: "Write of 8 bytes at 60 overflows 64-byte slot" },
    });
  });
});
