/**
 * In-memory metadata buffer
 *
 * Reference MetadataService handing out 64-byte aligned slots from a fixed
 * capacity.
 */

import { fail, ok } from "../errors";
import type { AllocResult, MetadataHandle, MetadataService } from "./types";

const SLOT_ALIGNMENT = 64;

export class MemoryMetadataStore implements MetadataService {
  private readonly storage: Uint8Array;
  private cursor = 0;

  constructor(capacity: number = 4096) {
    this.storage = new Uint8Array(capacity);
  }

  get bytes(): Uint8Array {
    return this.storage;
  }

  allocateMetadata(size: number): AllocResult<MetadataHandle> {
    const aligned = Math.ceil(size / SLOT_ALIGNMENT) * SLOT_ALIGNMENT;
    if (this.cursor + aligned > this.storage.byteLength) {
      return fail("ALLOC_METADATA", `Metadata buffer full: ${size} bytes requested`);
    }
    const handle: MetadataHandle = { offset: this.cursor, size };
    this.cursor += aligned;
    return ok(handle);
  }

  writeMetadata(handle: MetadataHandle, bytes: Uint8Array): AllocResult<void> {
    return this.writeMetadataAt(handle, 0, bytes);
  }

  writeMetadataAt(handle: MetadataHandle, byteOffset: number, bytes: Uint8Array): AllocResult<void> {
    if (byteOffset < 0 || byteOffset + bytes.byteLength > handle.size) {
      return fail(
        "METADATA_WRITE",
        `Write of ${bytes.byteLength} bytes at ${byteOffset} overflows ${handle.size}-byte slot`
      );
    }
    this.storage.set(bytes, handle.offset + byteOffset);
    return ok(undefined);
  }

  /**
   * Copy of a slot's bytes.
   */
  read(handle: MetadataHandle): Uint8Array {
    return this.storage.slice(handle.offset, handle.offset + handle.size);
  }
}
